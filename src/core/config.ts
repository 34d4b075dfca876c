/**
 * Configuration document (.keyrules.yaml)
 *
 * Parses YAML with js-yaml and validates the result against a TypeBox
 * schema, so the rest of the resolver works on typed rules only. Field
 * names are the on-disk contract and must not change.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { PolicyError, PolicyErrorCode } from './errors';

// YAML parses empty values ("kms:") as null
const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);
const Opt = <T extends TSchema>(schema: T) => Type.Optional(Nullable(schema));

/** Comma-separated string or list of strings */
const KeyList = Type.Union([Type.String(), Type.Array(Type.String())]);

const KmsKeySchema = Type.Object({
  arn: Type.String(),
  role: Opt(Type.String()),
  context: Opt(Type.Record(Type.String(), Type.String())),
  aws_profile: Opt(Type.String()),
});

const GcpKmsKeySchema = Type.Object({
  resource_id: Type.String(),
});

const AzureKeyVaultKeySchema = Type.Object({
  vaultUrl: Type.String(),
  key: Type.String(),
  version: Opt(Type.String()),
});

export const KeyGroupSchema = Type.Recursive(This =>
  Type.Object({
    merge: Opt(Type.Array(This)),
    kms: Opt(Type.Array(KmsKeySchema)),
    gcp_kms: Opt(Type.Array(GcpKmsKeySchema)),
    azure_keyvault: Opt(Type.Array(AzureKeyVaultKeySchema)),
    hc_vault: Opt(Type.Array(Type.String())),
    age: Opt(Type.Array(Type.String())),
    pgp: Opt(Type.Array(Type.String())),
  })
);

export const CreationRuleSchema = Type.Object({
  path_regex: Opt(Type.String()),
  /** @deprecated use path_regex */
  filename_regex: Opt(Type.String()),
  kms: Opt(KeyList),
  aws_profile: Opt(Type.String()),
  age: Opt(KeyList),
  pgp: Opt(KeyList),
  gcp_kms: Opt(KeyList),
  azure_keyvault: Opt(KeyList),
  hc_vault_transit_uri: Opt(KeyList),
  key_groups: Opt(Type.Array(KeyGroupSchema)),
  shamir_threshold: Opt(Type.Integer({ minimum: 0 })),
  unencrypted_suffix: Opt(Type.String()),
  encrypted_suffix: Opt(Type.String()),
  unencrypted_regex: Opt(Type.String()),
  encrypted_regex: Opt(Type.String()),
  unencrypted_comment_regex: Opt(Type.String()),
  encrypted_comment_regex: Opt(Type.String()),
  mac_only_encrypted: Opt(Type.Boolean()),
});

export const DestinationRuleSchema = Type.Object({
  path_regex: Opt(Type.String()),
  s3_bucket: Opt(Type.String()),
  s3_prefix: Opt(Type.String()),
  gcs_bucket: Opt(Type.String()),
  gcs_prefix: Opt(Type.String()),
  vault_path: Opt(Type.String()),
  vault_address: Opt(Type.String()),
  vault_kv_mount_name: Opt(Type.String()),
  vault_kv_version: Opt(Type.Integer()),
  recreation_rule: Opt(CreationRuleSchema),
  omit_extensions: Opt(Type.Boolean()),
});

const IndentStoreSchema = Type.Object({ indent: Opt(Type.Integer()) });

export const StoresConfigSchema = Type.Object({
  dotenv: Opt(Type.Object({})),
  ini: Opt(Type.Object({})),
  json: Opt(IndentStoreSchema),
  json_binary: Opt(IndentStoreSchema),
  yaml: Opt(IndentStoreSchema),
});

export const ConfigFileSchema = Type.Object({
  creation_rules: Opt(Type.Array(CreationRuleSchema)),
  destination_rules: Opt(Type.Array(DestinationRuleSchema)),
  stores: Opt(StoresConfigSchema),
});

export type KeyGroupConfig = Static<typeof KeyGroupSchema>;
export type CreationRule = Static<typeof CreationRuleSchema>;
export type DestinationRule = Static<typeof DestinationRuleSchema>;
export type ConfigFile = Static<typeof ConfigFileSchema>;

export interface StoresConfig {
  dotenv: object;
  ini: object;
  json: { indent: number };
  json_binary: { indent: number };
  yaml: { indent: number };
}

/**
 * Store defaults. -1 keeps the store's own default indentation.
 * Frozen: shared by every load.
 */
export const DEFAULT_STORES_CONFIG: Readonly<StoresConfig> = Object.freeze({
  dotenv: Object.freeze({}),
  ini: Object.freeze({}),
  json: Object.freeze({ indent: -1 }),
  json_binary: Object.freeze({ indent: -1 }),
  yaml: Object.freeze({ indent: 0 }),
});

/**
 * Parse and validate a config document.
 * Accepts raw bytes, a YAML string, or an already-deserialized value.
 *
 * @throws PolicyError with CONFIG_PARSE code on invalid YAML or shape
 */
export function parseConfig(content: unknown): ConfigFile {
  let doc: unknown = content;
  if (Buffer.isBuffer(content) || typeof content === 'string') {
    const text = Buffer.isBuffer(content) ? content.toString('utf8') : content;
    try {
      doc = yaml.load(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PolicyError(PolicyErrorCode.CONFIG_PARSE, `Could not parse config file: ${reason}`, {
        cause: err,
      });
    }
  }

  // Empty file
  if (doc === undefined || doc === null) {
    return {};
  }

  if (!Value.Check(ConfigFileSchema, doc)) {
    const problems = [...Value.Errors(ConfigFileSchema, doc)]
      .slice(0, 5)
      .map(e => `${e.path || '/'}: ${e.message}`);
    throw new PolicyError(
      PolicyErrorCode.CONFIG_PARSE,
      `Invalid config file: ${problems.join('; ')}`,
      { fields: problems }
    );
  }

  return doc;
}

/**
 * Read and parse a config file from disk.
 *
 * @throws PolicyError with CONFIG_READ when the file cannot be read
 */
export function loadConfigFile(configPath: string): ConfigFile {
  let content: Buffer;
  try {
    content = fs.readFileSync(configPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PolicyError(
      PolicyErrorCode.CONFIG_READ,
      `Could not read config file "${configPath}": ${reason}`,
      { value: configPath, cause: err }
    );
  }
  return parseConfig(content);
}

/**
 * Store settings of a config document, with defaults filled in.
 */
export function storesConfigOf(config: ConfigFile): StoresConfig {
  const stores = config.stores;
  return {
    dotenv: {},
    ini: {},
    json: { indent: stores?.json?.indent ?? DEFAULT_STORES_CONFIG.json.indent },
    json_binary: { indent: stores?.json_binary?.indent ?? DEFAULT_STORES_CONFIG.json_binary.indent },
    yaml: { indent: stores?.yaml?.indent ?? DEFAULT_STORES_CONFIG.yaml.indent },
  };
}

export function loadStoresConfig(configPath: string): StoresConfig {
  return storesConfigOf(loadConfigFile(configPath));
}
