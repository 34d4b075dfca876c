/**
 * Error taxonomy for policy resolution.
 *
 * Every failure surfaced by the resolver is a PolicyError carrying a code,
 * so callers can branch on `err.code` without matching on messages.
 */

export enum PolicyErrorCode {
  /** Config file could not be read from disk */
  CONFIG_READ = 'CONFIG_READ',
  /** Config document is not valid YAML or does not have the expected shape */
  CONFIG_PARSE = 'CONFIG_PARSE',
  /** No config file was found while walking up from the start directory */
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  /** A rule's path pattern is not a valid regular expression */
  REGEX_COMPILE = 'REGEX_COMPILE',
  /** No rule applies to the target path */
  NO_MATCHING_RULE = 'NO_MATCHING_RULE',
  /** Mutually exclusive rule options were set together */
  EXCLUSIVE_OPTION_CONFLICT = 'EXCLUSIVE_OPTION_CONFLICT',
  /** A destination rule names more than one destination */
  MULTIPLE_DESTINATIONS = 'MULTIPLE_DESTINATIONS',
  /** A key descriptor failed backend-specific validation */
  INVALID_KEY_DESCRIPTOR = 'INVALID_KEY_DESCRIPTOR',
  /** Building a key provider failed for a reason other than validation */
  PROVIDER_CONSTRUCTION = 'PROVIDER_CONSTRUCTION',
  /** No backend client is registered for the key's kind */
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
}

export interface PolicyErrorOptions {
  /** Path pattern of the rule involved */
  rule?: string;
  /** Config field names involved */
  fields?: string[];
  /** Key backend kind involved (e.g. "azure_kv") */
  backend?: string;
  /** Offending value */
  value?: string;
  cause?: unknown;
}

export class PolicyError extends Error {
  readonly code: PolicyErrorCode;
  readonly rule?: string;
  readonly fields?: string[];
  readonly backend?: string;
  readonly value?: string;

  constructor(code: PolicyErrorCode, message: string, options?: PolicyErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PolicyError';
    this.code = code;
    this.rule = options?.rule;
    this.fields = options?.fields;
    this.backend = options?.backend;
    this.value = options?.value;
  }
}

export function isPolicyError(err: unknown, code?: PolicyErrorCode): err is PolicyError {
  return err instanceof PolicyError && (code === undefined || err.code === code);
}
