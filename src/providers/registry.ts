/**
 * Provider Registry
 *
 * Turns key descriptors into live master keys. Dispatch is an exhaustive
 * switch over the descriptor kind: adding a backend means adding a
 * descriptor variant and one case here.
 */

import { PolicyError, PolicyErrorCode } from '../core/errors';
import { AgeMasterKey } from './age';
import { AzureKeyVaultMasterKey } from './azkv';
import { GcpKmsMasterKey } from './gcpkms';
import { VaultTransitMasterKey } from './hcvault';
import { KmsMasterKey } from './kms';
import { PgpMasterKey } from './pgp';
import { KeyDescriptor, MasterKey, ProviderOptions } from './types';

function assertNever(value: never): never {
  throw new PolicyError(
    PolicyErrorCode.PROVIDER_CONSTRUCTION,
    `Unknown key kind in descriptor: ${JSON.stringify(value)}`
  );
}

function instantiate(descriptor: KeyDescriptor, options: ProviderOptions): MasterKey {
  const backends = options.backends ?? {};
  switch (descriptor.kind) {
    case 'kms':
      return new KmsMasterKey(descriptor, backends.kms, options);
    case 'gcp_kms':
      return new GcpKmsMasterKey(descriptor, backends.gcp_kms, options);
    case 'azure_kv':
      return new AzureKeyVaultMasterKey(descriptor, backends.azure_kv, options);
    case 'hc_vault':
      return new VaultTransitMasterKey(descriptor, backends.hc_vault, options);
    case 'pgp':
      return new PgpMasterKey(descriptor, backends.pgp, options);
    case 'age':
      return new AgeMasterKey(descriptor, backends.age, options);
    default:
      return assertNever(descriptor);
  }
}

/**
 * Create a master key from a descriptor.
 *
 * @throws PolicyError with INVALID_KEY_DESCRIPTOR when the descriptor fails
 *   backend validation, or PROVIDER_CONSTRUCTION for any other failure
 */
export function createMasterKey(descriptor: KeyDescriptor, options: ProviderOptions = {}): MasterKey {
  try {
    return instantiate(descriptor, options);
  } catch (err) {
    if (err instanceof PolicyError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new PolicyError(
      PolicyErrorCode.PROVIDER_CONSTRUCTION,
      `Failed to create ${descriptor.kind} key: ${message}`,
      { backend: descriptor.kind, cause: err }
    );
  }
}

export function createMasterKeys(descriptors: KeyDescriptor[], options: ProviderOptions = {}): MasterKey[] {
  return descriptors.map(d => createMasterKey(d, options));
}
