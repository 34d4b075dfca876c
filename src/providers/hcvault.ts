/**
 * HashiCorp Vault transit master key.
 *
 * Keys are addressed by their full transit URI:
 *   https://vault.example.com:8200/v1/transit/keys/my-key
 */

import { BaseMasterKey, invalidDescriptor } from './base';
import { KeyBackend, ProviderOptions, splitKeyList, VaultTransitDescriptor } from './types';

const EXAMPLE_URI = 'https://vault.example.com:8200/v1/transit/keys/keyName';
const PREFIXED_PATH = /\/[^/]+\/v\d+\/[^/]+\/[^/]+\/[^/]+/;
const TRANSIT_PATH = /\/v\d+\/[^/]+\/[^/]+\/[^/]+/;
// scheme://host[:port] as written
const ADDRESS_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/[^/?#]+/;

interface TransitLocation {
  address: string;
  enginePath: string;
  keyName: string;
}

export class VaultTransitMasterKey extends BaseMasterKey<'hc_vault'> {
  readonly address: string;
  readonly enginePath: string;
  readonly keyName: string;

  constructor(
    descriptor: VaultTransitDescriptor,
    backend?: KeyBackend<VaultTransitDescriptor>,
    options: ProviderOptions = {}
  ) {
    const location = parseTransitUri(descriptor.uri);
    super({ kind: 'hc_vault', uri: descriptor.uri.trim() }, backend, options);
    this.address = location.address;
    this.enginePath = location.enginePath;
    this.keyName = location.keyName;
  }

  toString(): string {
    return `${this.address}/v1/${this.enginePath}/keys/${this.keyName}`;
  }

  toMap(): Record<string, unknown> {
    return {
      vault_address: this.address,
      engine_path: this.enginePath,
      key_name: this.keyName,
      ...super.toMap(),
    };
  }
}

export function parseTransitUri(uri: string): TransitLocation {
  const trimmed = uri.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw invalidDescriptor('hc_vault', trimmed, `not an absolute URI (expected e.g. ${EXAMPLE_URI})`);
  }

  const fullPath = parsed.pathname;
  if (PREFIXED_PATH.test(fullPath)) {
    throw invalidDescriptor(
      'hc_vault',
      trimmed,
      `running Vault with a prefixed URL is not supported (expected e.g. ${EXAMPLE_URI})`
    );
  }
  if (!TRANSIT_PATH.test(fullPath)) {
    throw invalidDescriptor('hc_vault', trimmed, `path is not a transit key path (expected e.g. ${EXAMPLE_URI})`);
  }

  // URL normalizes hosts ("4" becomes "0.0.0.4"), so the address is
  // taken from the input text
  const address = ADDRESS_PREFIX.exec(trimmed);
  if (!address) {
    throw invalidDescriptor('hc_vault', trimmed, `not an absolute URI (expected e.g. ${EXAMPLE_URI})`);
  }

  const dirs = fullPath.replace(/^\/+|\/+$/g, '').split('/');
  return {
    address: address[0],
    enginePath: dirs.slice(1, dirs.length - 2).join('/'),
    keyName: dirs[dirs.length - 1],
  };
}

export function vaultTransitDescriptorsFromShorthand(
  value: string | string[] | undefined | null
): VaultTransitDescriptor[] {
  return splitKeyList(value).map(uri => ({ kind: 'hc_vault', uri }));
}
