/**
 * GCP Cloud KMS master key, addressed by its full resource id:
 *   projects/<p>/locations/<l>/keyRings/<r>/cryptoKeys/<k>
 */

import { BaseMasterKey, invalidDescriptor } from './base';
import { GcpKmsKeyDescriptor, KeyBackend, ProviderOptions, splitKeyList } from './types';

export class GcpKmsMasterKey extends BaseMasterKey<'gcp_kms'> {
  constructor(
    descriptor: GcpKmsKeyDescriptor,
    backend?: KeyBackend<GcpKmsKeyDescriptor>,
    options: ProviderOptions = {}
  ) {
    const resourceId = descriptor.resourceId.replace(/ /g, '');
    if (!resourceId) {
      throw invalidDescriptor('gcp_kms', descriptor.resourceId, 'resource id must not be empty');
    }
    super({ kind: 'gcp_kms', resourceId }, backend, options);
  }

  toString(): string {
    return this.descriptor.resourceId;
  }

  toMap(): Record<string, unknown> {
    return { resource_id: this.descriptor.resourceId, ...super.toMap() };
  }
}

export function gcpKmsDescriptorsFromShorthand(
  value: string | string[] | undefined | null
): GcpKmsKeyDescriptor[] {
  return splitKeyList(value).map(resourceId => ({ kind: 'gcp_kms', resourceId }));
}
