/**
 * AWS KMS master key.
 *
 * Config shorthand:
 *   kms: arn:aws:kms:us-east-1:111122223333:key/abc,arn:aws:kms:...
 * An entry may carry an IAM role to assume, joined with "+":
 *   arn:aws:kms:...:key/abc+arn:aws:iam::111122223333:role/deployer
 */

import { BaseMasterKey, invalidDescriptor } from './base';
import { KeyBackend, KmsKeyDescriptor, ProviderOptions, splitKeyList } from './types';

const ROLE_SEPARATOR = '+arn:aws:iam::';

export class KmsMasterKey extends BaseMasterKey<'kms'> {
  constructor(
    descriptor: KmsKeyDescriptor,
    backend?: KeyBackend<KmsKeyDescriptor>,
    options: ProviderOptions = {}
  ) {
    const arn = descriptor.arn.replace(/ /g, '');
    if (!arn) {
      throw invalidDescriptor('kms', descriptor.arn, 'ARN must not be empty');
    }
    super({ ...descriptor, arn }, backend, options);
  }

  /**
   * `arn[+role][|context[|profile]]`, with the context section present
   * (possibly empty) whenever a profile is set.
   */
  toString(): string {
    const { arn, role, context, profile } = this.descriptor;
    let out = arn;
    if (role) out += `+${role}`;
    const ctx = formatContext(context);
    if (ctx || profile) out += `|${ctx}`;
    if (profile) out += `|${profile}`;
    return out;
  }

  toMap(): Record<string, unknown> {
    const out: Record<string, unknown> = { arn: this.descriptor.arn };
    if (this.descriptor.role) out.role = this.descriptor.role;
    if (this.descriptor.context && Object.keys(this.descriptor.context).length > 0) {
      out.context = { ...this.descriptor.context };
    }
    if (this.descriptor.profile) out.aws_profile = this.descriptor.profile;
    return { ...out, ...super.toMap() };
  }
}

function formatContext(context: Record<string, string> | undefined): string {
  if (!context) return '';
  return Object.keys(context)
    .sort()
    .map(key => `${key}:${context[key]}`)
    .join(',');
}

/**
 * Build a descriptor from one shorthand entry, splitting off an appended
 * role ARN.
 */
export function kmsDescriptorFromArn(
  entry: string,
  context?: Record<string, string>,
  profile?: string
): KmsKeyDescriptor {
  const arn = entry.replace(/ /g, '');
  const roleIndex = arn.indexOf(ROLE_SEPARATOR);
  const descriptor: KmsKeyDescriptor = { kind: 'kms', arn };
  if (roleIndex > 0) {
    descriptor.arn = arn.slice(0, roleIndex);
    descriptor.role = arn.slice(roleIndex + 1);
  }
  if (context && Object.keys(context).length > 0) descriptor.context = context;
  if (profile) descriptor.profile = profile;
  return descriptor;
}

export function kmsDescriptorsFromShorthand(
  value: string | string[] | undefined | null,
  context?: Record<string, string>,
  profile?: string
): KmsKeyDescriptor[] {
  return splitKeyList(value).map(entry => kmsDescriptorFromArn(entry, context, profile));
}

/**
 * Parse a KMS encryption context given as "key:value,key2:value2" or as a
 * map of strings. Anything else is ignored with a warning.
 */
export function parseEncryptionContext(input: unknown): Record<string, string> | undefined {
  const ignored = 'Encryption context contains a non-string value, context will not be used';

  if (typeof input === 'string') {
    if (input === '') return undefined;
    const out: Record<string, string> = {};
    for (const pair of input.split(',')) {
      const kv = pair.split(':');
      if (kv.length !== 2) {
        console.warn(ignored);
        return undefined;
      }
      out[kv[0]] = kv[1];
    }
    return out;
  }

  if (input !== null && typeof input === 'object' && !Array.isArray(input)) {
    const entries = Object.entries(input);
    if (entries.length === 0) return undefined;
    const out: Record<string, string> = {};
    for (const [key, value] of entries) {
      if (typeof value !== 'string') {
        console.warn(ignored);
        return undefined;
      }
      out[key] = value;
    }
    return out;
  }

  return undefined;
}
