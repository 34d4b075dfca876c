/**
 * Key providers
 *
 * Built-in backends:
 *   - kms:      AWS KMS
 *   - gcp_kms:  GCP Cloud KMS
 *   - azure_kv: Azure Key Vault
 *   - hc_vault: HashiCorp Vault transit
 *   - pgp:      PGP fingerprints
 *   - age:      age recipients
 *
 * Usage:
 *   import { createMasterKey } from './providers';
 *
 *   const key = createMasterKey({ kind: 'pgp', fingerprint: '85D77543B3D624B63CEA9E6DBC17301B491B3F21' });
 *   key.identity; // "pgp: 85D77543B3D624B63CEA9E6DBC17301B491B3F21"
 */

export { createMasterKey, createMasterKeys } from './registry';

export type {
  KeyDescriptor,
  KeyKind,
  DescriptorOf,
  KmsKeyDescriptor,
  GcpKmsKeyDescriptor,
  AzureKeyVaultDescriptor,
  VaultTransitDescriptor,
  PgpKeyDescriptor,
  AgeKeyDescriptor,
  MasterKey,
  KeyBackend,
  KeyBackends,
  ProviderOptions,
} from './types';

export { splitKeyList } from './types';
export { BaseMasterKey, DEFAULT_ROTATION_TTL_MS } from './base';
export { KmsMasterKey, kmsDescriptorFromArn, kmsDescriptorsFromShorthand, parseEncryptionContext } from './kms';
export { GcpKmsMasterKey, gcpKmsDescriptorsFromShorthand } from './gcpkms';
export {
  AzureKeyVaultMasterKey,
  azureKeyVaultDescriptorFromUrl,
  azureKeyVaultDescriptorsFromShorthand,
} from './azkv';
export { VaultTransitMasterKey, parseTransitUri, vaultTransitDescriptorsFromShorthand } from './hcvault';
export { PgpMasterKey, pgpDescriptorsFromShorthand } from './pgp';
export { AgeMasterKey, classifyRecipient, ageDescriptorsFromShorthand } from './age';
export type { AgeRecipientType } from './age';
