/**
 * age master key, addressed by recipient.
 *
 * Accepted recipients:
 *   - X25519 public keys:  age1<58 bech32 chars>
 *   - plugin recipients:   age1<plugin-name>1<bech32 data>
 *   - SSH public keys:     ssh-ed25519 AAAA... / ssh-rsa AAAA...
 */

import { BaseMasterKey, invalidDescriptor } from './base';
import { AgeKeyDescriptor, KeyBackend, ProviderOptions, splitKeyList } from './types';

const BECH32_CHARS = '[qpzry9x8gf2tvdw0s3jn54khce6mua7l]';
const X25519_RECIPIENT = new RegExp(`^age1${BECH32_CHARS}{58}$`);
const PLUGIN_RECIPIENT = new RegExp(`^age1[a-z0-9._-]+1${BECH32_CHARS}+$`);
const SSH_RECIPIENT = /^ssh-(ed25519|rsa) [A-Za-z0-9+/]+={0,2}( .*)?$/;

export type AgeRecipientType = 'x25519' | 'plugin' | 'ssh';

export class AgeMasterKey extends BaseMasterKey<'age'> {
  readonly recipientType: AgeRecipientType;

  constructor(
    descriptor: AgeKeyDescriptor,
    backend?: KeyBackend<AgeKeyDescriptor>,
    options: ProviderOptions = {}
  ) {
    const recipient = descriptor.recipient.trim();
    const recipientType = classifyRecipient(recipient);
    super({ kind: 'age', recipient }, backend, options);
    this.recipientType = recipientType;
  }

  toString(): string {
    return this.descriptor.recipient;
  }

  protected rotationTtlMs(): number | null {
    return null;
  }

  toMap(): Record<string, unknown> {
    return { recipient: this.descriptor.recipient, ...super.toMap() };
  }
}

export function classifyRecipient(recipient: string): AgeRecipientType {
  if (recipient.startsWith('age1')) {
    if (X25519_RECIPIENT.test(recipient)) return 'x25519';
    if (PLUGIN_RECIPIENT.test(recipient)) return 'plugin';
    throw invalidDescriptor('age', recipient, 'not a valid Bech32-encoded age recipient');
  }
  if (recipient.startsWith('ssh-')) {
    if (SSH_RECIPIENT.test(recipient)) return 'ssh';
    throw invalidDescriptor('age', recipient, 'not a valid ssh-ed25519 or ssh-rsa public key');
  }
  throw invalidDescriptor('age', recipient, 'unknown recipient type');
}

export function ageDescriptorsFromShorthand(
  value: string | string[] | undefined | null
): AgeKeyDescriptor[] {
  return splitKeyList(value).map(recipient => ({ kind: 'age', recipient }));
}
