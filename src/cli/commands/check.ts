import path from 'path';
import { ConfigFile, loadConfigFile } from '../../core/config';
import { findConfigFile } from '../../core/lookup';
import { creationPatternOf, destinationOf, policyFromRule } from '../../core/policy';
import { compilePattern, validateRulePatterns } from '../../core/rules';
import { failWith } from './output';

/**
 * Validate every rule of a config without resolving a particular file.
 */
export async function checkCommand(options: { config?: string; json?: boolean } = {}): Promise<void> {
  let configPath: string;
  let config: ConfigFile;
  try {
    configPath = options.config ?? findConfigFile(path.join(process.cwd(), '_'));
    config = loadConfigFile(configPath);
  } catch (error) {
    failWith(error, options.json);
  }

  const errors: string[] = [];

  (config.creation_rules ?? []).forEach((rule, i) => {
    try {
      // path_regex, or the deprecated filename_regex
      const pattern = creationPatternOf(rule, i);
      if (pattern !== '') compilePattern(pattern, i);
      policyFromRule(rule);
    } catch (err) {
      errors.push(`creation_rules[${i}]: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  errors.push(...validateRulePatterns(config.destination_rules, 'destination'));
  (config.destination_rules ?? []).forEach((rule, i) => {
    try {
      destinationOf(rule);
      policyFromRule(rule.recreation_rule ?? {});
    } catch (err) {
      errors.push(`destination_rules[${i}]: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

  const creationCount = config.creation_rules?.length ?? 0;
  const destinationCount = config.destination_rules?.length ?? 0;

  if (options.json) {
    console.log(JSON.stringify({ configPath, valid: errors.length === 0, errors, creationCount, destinationCount }, null, 2));
  } else if (errors.length === 0) {
    console.log(`✅ ${configPath}: ${creationCount} creation rule(s), ${destinationCount} destination rule(s)`);
  } else {
    console.error(`❌ ${configPath}: ${errors.length} problem(s)`);
    for (const e of errors) {
      console.error(`   ${e}`);
    }
  }

  if (errors.length > 0) process.exit(1);
}
