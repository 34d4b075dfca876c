/**
 * Azure Key Vault master key.
 *
 * Config shorthand is a comma-separated list of key URLs:
 *   azure_keyvault: https://myvault.vault.azure.net/keys/my-key/0123abcd
 */

import { BaseMasterKey, invalidDescriptor } from './base';
import { AzureKeyVaultDescriptor, KeyBackend, ProviderOptions, splitKeyList } from './types';

const KEY_URL_PATTERN = /^(https:\/\/[^/]+)\/keys\/([^/]+)\/([^/]+)$/;
const VAULT_URL_PATTERN = /^https:\/\/[^/]+$/;

export class AzureKeyVaultMasterKey extends BaseMasterKey<'azure_kv'> {
  constructor(
    descriptor: AzureKeyVaultDescriptor,
    backend?: KeyBackend<AzureKeyVaultDescriptor>,
    options: ProviderOptions = {}
  ) {
    const vaultUrl = descriptor.vaultUrl.trim().replace(/\/+$/, '');
    const keyName = descriptor.keyName.trim();
    const keyVersion = descriptor.keyVersion.trim();
    if (!VAULT_URL_PATTERN.test(vaultUrl)) {
      throw invalidDescriptor(
        'azure_kv',
        descriptor.vaultUrl,
        'vault URL must look like https://<vault-name>.vault.azure.net'
      );
    }
    if (!keyName || keyName.includes('/')) {
      throw invalidDescriptor('azure_kv', `${vaultUrl}/keys/${keyName}`, 'key name must be a single path segment');
    }
    super({ kind: 'azure_kv', vaultUrl, keyName, keyVersion }, backend, options);
  }

  toString(): string {
    const { vaultUrl, keyName, keyVersion } = this.descriptor;
    return `${vaultUrl}/keys/${keyName}/${keyVersion}`;
  }

  toMap(): Record<string, unknown> {
    return {
      vaultUrl: this.descriptor.vaultUrl,
      key: this.descriptor.keyName,
      version: this.descriptor.keyVersion,
      ...super.toMap(),
    };
  }
}

/**
 * Parse a key URL of the form https://host/keys/name/version.
 * @throws PolicyError with INVALID_KEY_DESCRIPTOR when the URL has another shape
 */
export function azureKeyVaultDescriptorFromUrl(url: string): AzureKeyVaultDescriptor {
  const trimmed = url.trim();
  const match = KEY_URL_PATTERN.exec(trimmed);
  if (!match) {
    throw invalidDescriptor(
      'azure_kv',
      trimmed,
      'expected a key URL like https://<vault-name>.vault.azure.net/keys/<key-name>/<key-version>'
    );
  }
  return { kind: 'azure_kv', vaultUrl: match[1], keyName: match[2], keyVersion: match[3] };
}

export function azureKeyVaultDescriptorsFromShorthand(
  value: string | string[] | undefined | null
): AzureKeyVaultDescriptor[] {
  return splitKeyList(value).map(azureKeyVaultDescriptorFromUrl);
}
