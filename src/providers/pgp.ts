/**
 * PGP master key, addressed by fingerprint. Spaces in the fingerprint are
 * ignored so that fingerprints can be pasted as gpg prints them.
 */

import { BaseMasterKey, invalidDescriptor } from './base';
import { KeyBackend, PgpKeyDescriptor, ProviderOptions, splitKeyList } from './types';

export class PgpMasterKey extends BaseMasterKey<'pgp'> {
  constructor(
    descriptor: PgpKeyDescriptor,
    backend?: KeyBackend<PgpKeyDescriptor>,
    options: ProviderOptions = {}
  ) {
    const fingerprint = descriptor.fingerprint.replace(/ /g, '');
    if (!fingerprint) {
      throw invalidDescriptor('pgp', descriptor.fingerprint, 'fingerprint must not be empty');
    }
    super({ kind: 'pgp', fingerprint }, backend, options);
  }

  toString(): string {
    return this.descriptor.fingerprint;
  }

  toMap(): Record<string, unknown> {
    return { fp: this.descriptor.fingerprint, ...super.toMap() };
  }
}

export function pgpDescriptorsFromShorthand(
  value: string | string[] | undefined | null
): PgpKeyDescriptor[] {
  return splitKeyList(value).map(fingerprint => ({ kind: 'pgp', fingerprint }));
}
