/**
 * Policy resolution
 *
 * Picks the creation (or destination) rule for a file and turns it into
 * a resolved policy: key groups, threshold, encryption selector and
 * destination. Resolution is synchronous and pure over the parsed
 * document; every call returns a fresh policy.
 */

import type { ProviderOptions } from '../providers';
import { ConfigFile, CreationRule, DestinationRule, loadConfigFile, parseConfig } from './config';
import { Destination, GcsDestination, S3Destination, VaultDestination } from './destinations';
import { PolicyError, PolicyErrorCode } from './errors';
import { KeyGroup, keyGroupFromShorthands, keyGroupsFromConfig } from './keygroups';
import { relativeToConfigDir } from './lookup';
import { findMatchingRule, pathPatternOf } from './rules';

/** Selective-encryption fields, at most one per rule */
export const SELECTOR_FIELDS = [
  'unencrypted_suffix',
  'encrypted_suffix',
  'unencrypted_regex',
  'encrypted_regex',
  'unencrypted_comment_regex',
  'encrypted_comment_regex',
] as const;

export type SelectorField = (typeof SELECTOR_FIELDS)[number];

/** Which document fields get encrypted */
export interface EncryptionSelector {
  field: SelectorField;
  value: string;
}

export interface ResolvedPolicy {
  keyGroups: KeyGroup[];
  shamirThreshold: number;
  /** null: encrypt every value */
  selectiveEncryption: EncryptionSelector | null;
  macOnlyEncrypted: boolean;
  destination?: Destination;
  omitExtensions: boolean;
}

/**
 * Where the config comes from. `content` is raw bytes, YAML text, or an
 * already-deserialized document.
 */
export interface ConfigSource {
  configPath: string;
  content: unknown;
}

export type EncryptionContext = Record<string, string>;

/**
 * Selector of a rule.
 *
 * @throws PolicyError with EXCLUSIVE_OPTION_CONFLICT when several are set
 */
export function selectorOf(rule: CreationRule): EncryptionSelector | null {
  const set: EncryptionSelector[] = [];
  for (const field of SELECTOR_FIELDS) {
    const value = rule[field];
    if (value) set.push({ field, value });
  }

  if (set.length > 1) {
    const fields = set.map(s => s.field);
    throw new PolicyError(
      PolicyErrorCode.EXCLUSIVE_OPTION_CONFLICT,
      `Cannot use more than one of ${SELECTOR_FIELDS.join(', ')} for the same rule (found ${fields.join(' and ')})`,
      { rule: rule.path_regex ?? '', fields }
    );
  }

  return set[0] ?? null;
}

/**
 * Build the policy of one creation rule.
 *
 * @param kmsContext - encryption context for KMS keys given as shorthands;
 *   explicit key groups carry their own context
 */
export function policyFromRule(
  rule: CreationRule,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy {
  const selectiveEncryption = selectorOf(rule);

  // Explicit key groups take precedence; shorthand keys are then ignored
  const explicitGroups = rule.key_groups ?? [];
  const keyGroups: KeyGroup[] =
    explicitGroups.length > 0
      ? keyGroupsFromConfig(explicitGroups, options)
      : [keyGroupFromShorthands(rule, kmsContext, options)];

  return {
    keyGroups,
    shamirThreshold: rule.shamir_threshold ?? 0,
    selectiveEncryption,
    macOnlyEncrypted: rule.mac_only_encrypted ?? false,
    omitExtensions: false,
  };
}

/**
 * Pattern of a creation rule, honouring the deprecated filename_regex.
 */
export function creationPatternOf(rule: CreationRule, index: number): string {
  const pathRegex = rule.path_regex ?? '';
  const filenameRegex = rule.filename_regex ?? '';

  if (filenameRegex === '') return pathRegex;

  if (pathRegex !== '') {
    throw new PolicyError(
      PolicyErrorCode.EXCLUSIVE_OPTION_CONFLICT,
      `Cannot use both path_regex and filename_regex in creation rule #${index + 1}`,
      { rule: pathRegex, fields: ['path_regex', 'filename_regex'] }
    );
  }

  console.warn(
    `⚠️  creation rule #${index + 1}: filename_regex is deprecated and will be removed, use path_regex instead`
  );
  return filenameRegex;
}

function configOf(source: ConfigSource): ConfigFile {
  return parseConfig(source.content);
}

/**
 * Resolve the creation policy for `filePath`.
 * The path is matched relative to the config file's directory.
 *
 * @returns null when the config defines no creation rules at all, meaning
 *   "not configured": callers fall back to their defaults
 */
export function resolveCreationPolicyFromConfig(
  config: ConfigFile,
  configPath: string,
  filePath: string,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy | null {
  const rules = config.creation_rules;
  if (!rules || rules.length === 0) {
    return null;
  }

  const subject = relativeToConfigDir(configPath, filePath);
  const { rule } = findMatchingRule(rules, subject, creationPatternOf, 'creation');
  return policyFromRule(rule, kmsContext, options);
}

export function resolveCreationPolicy(
  source: ConfigSource,
  filePath: string,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy | null {
  return resolveCreationPolicyFromConfig(configOf(source), source.configPath, filePath, kmsContext, options);
}

/**
 * Destination of a destination rule.
 *
 * @throws PolicyError with MULTIPLE_DESTINATIONS when more than one is set
 */
export function destinationOf(rule: DestinationRule): Destination | undefined {
  const set: string[] = [];
  if (rule.s3_bucket) set.push('s3_bucket');
  if (rule.gcs_bucket) set.push('gcs_bucket');
  if (rule.vault_path) set.push('vault_path');

  if (set.length > 1) {
    throw new PolicyError(
      PolicyErrorCode.MULTIPLE_DESTINATIONS,
      `More than one destination found in a single destination rule (${set.join(', ')}); only one per rule is allowed`,
      { rule: rule.path_regex ?? '', fields: set }
    );
  }

  if (rule.s3_bucket) {
    return new S3Destination(rule.s3_bucket, rule.s3_prefix ?? '');
  }
  if (rule.gcs_bucket) {
    return new GcsDestination(rule.gcs_bucket, rule.gcs_prefix ?? '');
  }
  if (rule.vault_path) {
    return new VaultDestination({
      address: rule.vault_address ?? undefined,
      path: rule.vault_path,
      mountName: rule.vault_kv_mount_name ?? undefined,
      kvVersion: rule.vault_kv_version ?? undefined,
    });
  }
  return undefined;
}

/**
 * Resolve the policy for publishing `filePath`: the matching destination
 * rule's destination plus its recreation rule. The path is matched as
 * given.
 */
export function resolveDestinationPolicyFromConfig(
  config: ConfigFile,
  filePath: string,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy {
  const { rule } = findMatchingRule(config.destination_rules, filePath, pathPatternOf, 'destination');

  const destination = destinationOf(rule);
  const policy = policyFromRule(rule.recreation_rule ?? {}, kmsContext, options);
  return {
    ...policy,
    destination,
    omitExtensions: rule.omit_extensions ?? false,
  };
}

export function resolveDestinationPolicy(
  source: ConfigSource,
  filePath: string,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy {
  return resolveDestinationPolicyFromConfig(configOf(source), filePath, kmsContext, options);
}

/**
 * Read the config at `configPath` and resolve the creation policy.
 */
export function loadCreationPolicyForFile(
  configPath: string,
  filePath: string,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy | null {
  return resolveCreationPolicyFromConfig(loadConfigFile(configPath), configPath, filePath, kmsContext, options);
}

export function loadDestinationPolicyForFile(
  configPath: string,
  filePath: string,
  kmsContext?: EncryptionContext,
  options: ProviderOptions = {}
): ResolvedPolicy {
  return resolveDestinationPolicyFromConfig(loadConfigFile(configPath), filePath, kmsContext, options);
}
