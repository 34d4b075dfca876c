/**
 * keyrules
 *
 * Resolves which keys protect a file from the creation rules of a
 * .keyrules.yaml config.
 *
 * Usage:
 *   import { loadCreationPolicyForFile, findConfigFile } from 'keyrules';
 *
 *   const configPath = findConfigFile('secrets/prod.yaml');
 *   const policy = loadCreationPolicyForFile(configPath, path.resolve('secrets/prod.yaml'));
 *   if (policy === null) {
 *     // no creation rules: use defaults
 *   }
 */

export {
  resolveCreationPolicy,
  resolveCreationPolicyFromConfig,
  resolveDestinationPolicy,
  resolveDestinationPolicyFromConfig,
  loadCreationPolicyForFile,
  loadDestinationPolicyForFile,
  policyFromRule,
  selectorOf,
  destinationOf,
  creationPatternOf,
  SELECTOR_FIELDS,
} from './core/policy';

export type {
  ResolvedPolicy,
  EncryptionSelector,
  SelectorField,
  ConfigSource,
  EncryptionContext,
} from './core/policy';

export {
  parseConfig,
  loadConfigFile,
  loadStoresConfig,
  storesConfigOf,
  DEFAULT_STORES_CONFIG,
} from './core/config';

export type { ConfigFile, CreationRule, DestinationRule, KeyGroupConfig, StoresConfig } from './core/config';

export { deduplicateKeyGroup, extractMasterKeys, keyGroupsFromConfig, keyGroupFromShorthands } from './core/keygroups';
export type { KeyGroup } from './core/keygroups';

export { findMatchingRule, compilePattern, validateRulePatterns } from './core/rules';
export type { RuleMatch } from './core/rules';

export {
  lookupConfigFile,
  findConfigFile,
  relativeToConfigDir,
  nodeFileSystem,
  CONFIG_FILE_NAME,
} from './core/lookup';
export type { FileSystem, FileStat, ConfigLookupResult } from './core/lookup';

export { S3Destination, GcsDestination, VaultDestination } from './core/destinations';
export type { Destination, VaultDestinationOptions } from './core/destinations';

export { PolicyError, PolicyErrorCode, isPolicyError } from './core/errors';

export * from './providers';
