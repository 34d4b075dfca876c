/**
 * Key Provider Interface
 *
 * Descriptors are the declarative form of a key as written in the config
 * file; master keys are the live handles built from them. Encryption and
 * decryption are delegated to a backend client injected per kind.
 */

// --- Descriptors -----------------------------------------

export interface KmsKeyDescriptor {
  kind: 'kms';
  arn: string;
  role?: string;
  context?: Record<string, string>;
  profile?: string;
}

export interface GcpKmsKeyDescriptor {
  kind: 'gcp_kms';
  resourceId: string;
}

export interface AzureKeyVaultDescriptor {
  kind: 'azure_kv';
  vaultUrl: string;
  keyName: string;
  keyVersion: string;
}

export interface VaultTransitDescriptor {
  kind: 'hc_vault';
  uri: string;
}

export interface PgpKeyDescriptor {
  kind: 'pgp';
  fingerprint: string;
}

export interface AgeKeyDescriptor {
  kind: 'age';
  recipient: string;
}

export type KeyDescriptor =
  | KmsKeyDescriptor
  | GcpKmsKeyDescriptor
  | AzureKeyVaultDescriptor
  | VaultTransitDescriptor
  | PgpKeyDescriptor
  | AgeKeyDescriptor;

export type KeyKind = KeyDescriptor['kind'];

export type DescriptorOf<K extends KeyKind> = Extract<KeyDescriptor, { kind: K }>;

// --- Handles ---------------------------------------------

/**
 * A live key provider handle. One handle exists per key in a resolved
 * key group.
 */
export interface MasterKey {
  readonly kind: KeyKind;

  /** `"<kind>: <canonical string>"`, used to deduplicate key groups */
  readonly identity: string;

  readonly createdAt: Date;

  /**
   * Encrypt a data key with this master key.
   * @returns the backend's ciphertext
   * @throws PolicyError with PROVIDER_UNAVAILABLE when no backend is registered
   */
  encrypt(plaintext: Buffer): Promise<string>;

  decrypt(ciphertext: string): Promise<Buffer>;

  /** Canonical string form of the key */
  toString(): string;

  needsRotation(): boolean;

  /** Flat record suitable for writing into encrypted file metadata */
  toMap(): Record<string, unknown>;
}

/**
 * Client for one key backend. Implementations talk to the actual service
 * (KMS, Vault, gpg, ...); nothing in this package does.
 */
export interface KeyBackend<D extends KeyDescriptor = KeyDescriptor> {
  encrypt(descriptor: D, plaintext: Buffer): Promise<string>;
  decrypt(descriptor: D, ciphertext: string): Promise<Buffer>;
}

export type KeyBackends = {
  [K in KeyKind]?: KeyBackend<DescriptorOf<K>>;
};

export interface ProviderOptions {
  backends?: KeyBackends;
  /** Clock used for key creation dates (default: current time) */
  now?: () => Date;
}

// --- Shorthand lists -------------------------------------

/**
 * Split a comma-separated shorthand (or a list of them) into trimmed,
 * non-empty entries.
 */
export function splitKeyList(value: string | string[] | undefined | null): string[] {
  if (value === undefined || value === null) return [];
  const parts = Array.isArray(value) ? value.flatMap(v => v.split(',')) : value.split(',');
  return parts.map(p => p.trim()).filter(p => p.length > 0);
}
