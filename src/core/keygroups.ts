/**
 * Key group assembly
 *
 * A key group in the config may nest further groups under `merge`. They
 * are flattened depth-first (merged children first, then the group's own
 * keys), turned into master keys, and deduplicated by identity keeping
 * the first occurrence.
 */

import {
  ageDescriptorsFromShorthand,
  azureKeyVaultDescriptorsFromShorthand,
  createMasterKey,
  gcpKmsDescriptorsFromShorthand,
  kmsDescriptorsFromShorthand,
  pgpDescriptorsFromShorthand,
  vaultTransitDescriptorsFromShorthand,
} from '../providers';
import type { KeyDescriptor, KmsKeyDescriptor, MasterKey, ProviderOptions } from '../providers';
import type { CreationRule, KeyGroupConfig } from './config';
import { PolicyError } from './errors';

export type KeyGroup = MasterKey[];

/**
 * Drop keys whose identity was already seen, keeping order.
 * Idempotent: deduplicateKeyGroup(deduplicateKeyGroup(g)) equals deduplicateKeyGroup(g).
 */
export function deduplicateKeyGroup(group: readonly MasterKey[]): KeyGroup {
  const seen = new Set<string>();
  const out: KeyGroup = [];
  for (const key of group) {
    if (seen.has(key.identity)) continue;
    seen.add(key.identity);
    out.push(key);
  }
  return out;
}

/**
 * Descriptors of one group's own keys (not its merged children), in
 * assembly order: age, pgp, kms, gcp_kms, azure_keyvault, hc_vault.
 */
export function ownDescriptors(group: KeyGroupConfig): KeyDescriptor[] {
  const descriptors: KeyDescriptor[] = [];

  for (const entry of group.age ?? []) {
    descriptors.push(...ageDescriptorsFromShorthand(entry));
  }
  for (const fingerprint of group.pgp ?? []) {
    descriptors.push({ kind: 'pgp', fingerprint });
  }
  for (const k of group.kms ?? []) {
    const descriptor: KmsKeyDescriptor = { kind: 'kms', arn: k.arn };
    if (k.role) descriptor.role = k.role;
    if (k.context && Object.keys(k.context).length > 0) descriptor.context = k.context;
    if (k.aws_profile) descriptor.profile = k.aws_profile;
    descriptors.push(descriptor);
  }
  for (const k of group.gcp_kms ?? []) {
    descriptors.push({ kind: 'gcp_kms', resourceId: k.resource_id });
  }
  for (const k of group.azure_keyvault ?? []) {
    descriptors.push({ kind: 'azure_kv', vaultUrl: k.vaultUrl, keyName: k.key, keyVersion: k.version ?? '' });
  }
  for (const uri of group.hc_vault ?? []) {
    if (uri === '') continue;
    descriptors.push({ kind: 'hc_vault', uri });
  }

  return descriptors;
}

/**
 * Flatten a key group (and everything merged into it) into one
 * deduplicated list of master keys.
 *
 * @throws PolicyError from key instantiation, unchanged
 */
export function extractMasterKeys(group: KeyGroupConfig, options: ProviderOptions = {}): KeyGroup {
  const keys: MasterKey[] = [];
  for (const child of group.merge ?? []) {
    keys.push(...extractMasterKeys(child, options));
  }
  for (const descriptor of ownDescriptors(group)) {
    keys.push(createMasterKey(descriptor, options));
  }
  return deduplicateKeyGroup(keys);
}

/**
 * Resolve the explicit `key_groups` of a rule, each group independently.
 * Errors are rethrown with the index of the failing group.
 */
export function keyGroupsFromConfig(groups: readonly KeyGroupConfig[], options: ProviderOptions = {}): KeyGroup[] {
  return groups.map((group, index) => {
    try {
      return extractMasterKeys(group, options);
    } catch (err) {
      if (err instanceof PolicyError) {
        throw new PolicyError(err.code, `key_groups[${index}]: ${err.message}`, {
          rule: err.rule,
          fields: err.fields,
          backend: err.backend,
          value: err.value,
          cause: err,
        });
      }
      throw err;
    }
  });
}

/**
 * Build the single implicit key group of a rule that uses the flat
 * shorthand fields. KMS keys get `kmsContext` and the rule's aws_profile.
 */
export function keyGroupFromShorthands(
  rule: CreationRule,
  kmsContext: Record<string, string> | undefined,
  options: ProviderOptions = {}
): KeyGroup {
  const descriptors: KeyDescriptor[] = [
    ...ageDescriptorsFromShorthand(rule.age),
    ...pgpDescriptorsFromShorthand(rule.pgp),
    ...kmsDescriptorsFromShorthand(rule.kms, kmsContext, rule.aws_profile ?? undefined),
    ...gcpKmsDescriptorsFromShorthand(rule.gcp_kms),
    ...azureKeyVaultDescriptorsFromShorthand(rule.azure_keyvault),
    ...vaultTransitDescriptorsFromShorthand(rule.hc_vault_transit_uri),
  ];
  return deduplicateKeyGroup(descriptors.map(d => createMasterKey(d, options)));
}
