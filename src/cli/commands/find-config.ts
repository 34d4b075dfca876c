import path from 'path';
import { ConfigLookupResult, lookupConfigFile } from '../../core/lookup';
import { failWith } from './output';

export async function findConfigCommand(start: string | undefined, options: { json?: boolean } = {}): Promise<void> {
  let result: ConfigLookupResult;
  try {
    // The search starts in the directory holding its argument
    result = lookupConfigFile(path.join(path.resolve(start ?? '.'), '_'));
  } catch (error) {
    failWith(error, options.json);
  }

  if (options.json) {
    console.log(JSON.stringify({ path: result.path, warning: result.warning ?? null }, null, 2));
  } else {
    if (result.warning) {
      console.warn(`⚠️  ${result.warning}`);
    }
    if (result.path) {
      console.log(result.path);
    } else {
      console.error('❌ No config file found');
    }
  }

  if (!result.path) process.exit(1);
}
