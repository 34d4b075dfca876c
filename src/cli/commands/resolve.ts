import path from 'path';
import { findConfigFile } from '../../core/lookup';
import { loadCreationPolicyForFile, loadDestinationPolicyForFile, ResolvedPolicy } from '../../core/policy';
import { parseEncryptionContext } from '../../providers';
import { failWith } from './output';

export interface ResolveOptions {
  config?: string;
  destination?: boolean;
  encryptionContext?: string;
  json?: boolean;
}

/** Name the document is published under */
export function publishedName(file: string, omitExtensions: boolean): string {
  return omitExtensions ? path.parse(file).name : path.basename(file);
}

export function policyToJSON(policy: ResolvedPolicy, file: string): Record<string, unknown> {
  return {
    keyGroups: policy.keyGroups.map(group => group.map(key => key.identity)),
    shamirThreshold: policy.shamirThreshold,
    selectiveEncryption: policy.selectiveEncryption,
    macOnlyEncrypted: policy.macOnlyEncrypted,
    destination: policy.destination ? policy.destination.path(publishedName(file, policy.omitExtensions)) : null,
    omitExtensions: policy.omitExtensions,
  };
}

export async function resolveCommand(file: string, options: ResolveOptions = {}): Promise<void> {
  try {
    const filePath = path.resolve(file);
    const configPath = options.config ?? findConfigFile(filePath);
    const kmsContext = parseEncryptionContext(options.encryptionContext ?? '');

    const policy = options.destination
      ? loadDestinationPolicyForFile(configPath, file, kmsContext)
      : loadCreationPolicyForFile(configPath, filePath, kmsContext);

    if (options.json) {
      console.log(JSON.stringify(policy ? { configPath, policy: policyToJSON(policy, file) } : { configPath, policy: null }, null, 2));
      return;
    }

    if (!policy) {
      console.log(`No creation rules in ${configPath}; defaults apply.`);
      return;
    }

    console.log('');
    console.log(`Config: ${configPath}`);
    console.log(`File:   ${file}`);
    console.log('');
    policy.keyGroups.forEach((group, i) => {
      console.log(`Key group ${i + 1}:`);
      if (group.length === 0) {
        console.log('  (no keys)');
      }
      for (const key of group) {
        console.log(`  ${key.identity}`);
      }
    });
    console.log('');
    if (policy.shamirThreshold > 0) {
      console.log(`Shamir threshold: ${policy.shamirThreshold}`);
    }
    if (policy.selectiveEncryption) {
      console.log(`Encrypt: ${policy.selectiveEncryption.field} = ${policy.selectiveEncryption.value}`);
    } else {
      console.log('Encrypt: all values');
    }
    if (policy.macOnlyEncrypted) {
      console.log('MAC: encrypted values only');
    }
    if (policy.destination) {
      console.log(`Destination: ${policy.destination.path(publishedName(file, policy.omitExtensions))}`);
    }
    console.log('');

  } catch (error) {
    failWith(error, options.json);
  }
}
