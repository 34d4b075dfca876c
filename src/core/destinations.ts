/**
 * Publish destinations
 *
 * A destination rule may name one sink where re-encrypted documents are
 * published. Only addressing lives here; uploads belong to the sink's
 * client.
 */

export interface Destination {
  readonly type: 's3' | 'gcs' | 'vault';
  /** Full address the document named `fileName` would be published to */
  path(fileName: string): string;
}

export class S3Destination implements Destination {
  readonly type = 's3';

  constructor(
    readonly bucket: string,
    readonly prefix: string = ''
  ) {}

  path(fileName: string): string {
    return `s3://${this.bucket}/${this.prefix}${fileName}`;
  }
}

export class GcsDestination implements Destination {
  readonly type = 'gcs';

  constructor(
    readonly bucket: string,
    readonly prefix: string = ''
  ) {}

  path(fileName: string): string {
    return `gcs://${this.bucket}/${this.prefix}${fileName}`;
  }
}

export const DEFAULT_VAULT_ADDRESS = 'https://127.0.0.1:8200';

export interface VaultDestinationOptions {
  address?: string;
  path: string;
  /** KV secrets engine mount (default: "secret/") */
  mountName?: string;
  /** KV engine version, 1 or 2 (default: 2) */
  kvVersion?: number;
}

export class VaultDestination implements Destination {
  readonly type = 'vault';
  readonly address?: string;
  readonly vaultPath: string;
  readonly mountName: string;
  readonly kvVersion: 1 | 2;

  constructor(options: VaultDestinationOptions) {
    this.address = options.address || undefined;
    this.vaultPath = options.path.endsWith('/') ? options.path : `${options.path}/`;
    const mount = options.mountName || 'secret/';
    this.mountName = mount.endsWith('/') ? mount : `${mount}/`;
    this.kvVersion = options.kvVersion === 1 ? 1 : 2;
  }

  /** Configured address, then VAULT_ADDR, then the local default */
  getAddress(): string {
    return this.address || process.env.VAULT_ADDR || DEFAULT_VAULT_ADDRESS;
  }

  /** Logical path of the secret, as used by the Vault API */
  secretsPath(fileName: string): string {
    if (this.kvVersion === 1) {
      return `${this.mountName}${this.vaultPath}${fileName}`;
    }
    return `${this.mountName}data/${this.vaultPath}${fileName}`;
  }

  path(fileName: string): string {
    return `${this.getAddress()}/v1/${this.secretsPath(fileName)}`;
  }
}
