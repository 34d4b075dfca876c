#!/usr/bin/env node

/**
 * keyrules CLI
 * Inspect which keys protect a file
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { checkCommand } from './commands/check';
import { findConfigCommand } from './commands/find-config';
import { resolveCommand } from './commands/resolve';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version = packageJson.version || '0.0.0';

const program = new Command();

program
  .name('keyrules')
  .description('Key-provider policy resolution for encrypted files')
  .version(version);

program
  .command('resolve <file>')
  .description('Show the keys and encryption settings the matching rule gives a file')
  .option('-c, --config <path>', 'Config file to use instead of searching for .keyrules.yaml')
  .option('-d, --destination', 'Resolve against destination_rules instead of creation_rules')
  .option('--encryption-context <ctx>', 'KMS encryption context, as key:value,key2:value2')
  .option('--json', 'Output as JSON')
  .action(resolveCommand);

program
  .command('find-config [start]')
  .description('Print the config file that applies to a directory (default: current directory)')
  .option('--json', 'Output as JSON')
  .action(findConfigCommand);

program
  .command('check')
  .description('Validate every rule of a config file')
  .option('-c, --config <path>', 'Config file to check instead of searching for .keyrules.yaml')
  .option('--json', 'Output as JSON')
  .action(checkCommand);

program.parse();
