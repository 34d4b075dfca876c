import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';

// Config discovery is stubbed; resolve and check get explicit --config paths
vi.mock('../../core/lookup', async importOriginal => ({
  ...(await importOriginal<typeof import('../../core/lookup')>()),
  lookupConfigFile: vi.fn(),
}));

import { lookupConfigFile } from '../../core/lookup';
import { resolveCommand } from './resolve';
import { findConfigCommand } from './find-config';
import { checkCommand } from './check';

const mockLookupConfigFile = vi.mocked(lookupConfigFile);

// Capture console output
function captureConsole() {
  const logs: string[] = [];
  const errors: string[] = [];
  const warnings: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  const origWarn = console.warn;
  console.log = (...args: unknown[]) => logs.push(args.join(' '));
  console.error = (...args: unknown[]) => errors.push(args.join(' '));
  console.warn = (...args: unknown[]) => warnings.push(args.join(' '));
  return {
    logs,
    errors,
    warnings,
    restore: () => {
      console.log = origLog;
      console.error = origError;
      console.warn = origWarn;
    }
  };
}

// Mock process.exit
const mockExit = vi.spyOn(process, 'exit').mockImplementation(() => {
  throw new Error('process.exit called');
});

const CONFIG = `
creation_rules:
  - path_regex: \\.prod\\.yaml$
    kms: arn:A
    shamir_threshold: 1
    encrypted_regex: ^data$
  - pgp: FPR1
destination_rules:
  - path_regex: ^prod/
    s3_bucket: my-bucket
    omit_extensions: true
    recreation_rule:
      pgp: FPR2
`;

let testDir: string;
let configPath: string;

function writeConfig(content: string) {
  fs.writeFileSync(configPath, content);
}

beforeEach(() => {
  vi.clearAllMocks();
  testDir = path.join(os.tmpdir(), `keyrules-cli-${Date.now()}-${Math.random().toString(36).substring(7)}`);
  fs.mkdirSync(testDir, { recursive: true });
  configPath = path.join(testDir, '.keyrules.yaml');
  writeConfig(CONFIG);
});

afterEach(() => {
  fs.rmSync(testDir, { recursive: true, force: true });
});

describe('resolveCommand', () => {
  it('should print the key groups of the matching rule', async () => {
    const cap = captureConsole();
    await resolveCommand(path.join(testDir, 'app.prod.yaml'), { config: configPath });
    cap.restore();
    expect(cap.logs).toContain('Key group 1:');
    expect(cap.logs).toContain('  kms: arn:A');
    expect(cap.logs).toContain('Shamir threshold: 1');
    expect(cap.logs).toContain('Encrypt: encrypted_regex = ^data$');
  });

  it('should output the policy as JSON', async () => {
    const cap = captureConsole();
    await resolveCommand(path.join(testDir, 'app.dev.yaml'), { config: configPath, json: true });
    cap.restore();
    expect(JSON.parse(cap.logs.join(''))).toEqual({
      configPath,
      policy: {
        keyGroups: [['pgp: FPR1']],
        shamirThreshold: 0,
        selectiveEncryption: null,
        macOnlyEncrypted: false,
        destination: null,
        omitExtensions: false,
      },
    });
  });

  it('should apply the encryption context to KMS keys', async () => {
    const cap = captureConsole();
    await resolveCommand(path.join(testDir, 'app.prod.yaml'), {
      config: configPath,
      encryptionContext: 'env:prod',
      json: true,
    });
    cap.restore();
    const parsed = JSON.parse(cap.logs.join(''));
    expect(parsed.policy.keyGroups).toEqual([['kms: arn:A|env:prod']]);
  });

  it('should resolve against destination rules', async () => {
    const cap = captureConsole();
    await resolveCommand('prod/app.yaml', { config: configPath, destination: true, json: true });
    cap.restore();
    const parsed = JSON.parse(cap.logs.join(''));
    expect(parsed.policy.destination).toBe('s3://my-bucket/app');
    expect(parsed.policy.keyGroups).toEqual([['pgp: FPR2']]);
  });

  it('should print the destination address', async () => {
    const cap = captureConsole();
    await resolveCommand('prod/app.yaml', { config: configPath, destination: true });
    cap.restore();
    expect(cap.logs).toContain('Destination: s3://my-bucket/app');
  });

  it('should report a config without creation rules', async () => {
    writeConfig('stores: {}\n');
    const cap = captureConsole();
    await resolveCommand(path.join(testDir, 'a.yaml'), { config: configPath });
    cap.restore();
    expect(cap.logs).toEqual([`No creation rules in ${configPath}; defaults apply.`]);
  });

  it('should exit with error when no rule matches', async () => {
    writeConfig('creation_rules:\n  - path_regex: prod\n    pgp: FPR1\n');
    const cap = captureConsole();
    try {
      await resolveCommand(path.join(testDir, 'dev.yaml'), { config: configPath });
    } catch (e) {
      // process.exit throws
    }
    cap.restore();
    expect(mockExit).toHaveBeenCalledWith(1);
    expect(cap.errors).toEqual(['❌ Error: No matching creation rule found for "dev.yaml"']);
  });

  it('should show JSON error with code when the config is unreadable', async () => {
    const cap = captureConsole();
    try {
      await resolveCommand(path.join(testDir, 'a.yaml'), { config: path.join(testDir, 'missing.yaml'), json: true });
    } catch (e) {}
    cap.restore();
    expect(mockExit).toHaveBeenCalledWith(1);
    expect(JSON.parse(cap.logs.join('')).code).toBe('CONFIG_READ');
  });
});

describe('findConfigCommand', () => {
  it('should print the config path found', async () => {
    mockLookupConfigFile.mockReturnValue({ path: '/repo/.keyrules.yaml' });
    const cap = captureConsole();
    await findConfigCommand('/repo/sub');
    cap.restore();
    expect(mockLookupConfigFile).toHaveBeenCalledWith('/repo/sub/_');
    expect(cap.logs).toEqual(['/repo/.keyrules.yaml']);
  });

  it('should print the lookup warning', async () => {
    mockLookupConfigFile.mockReturnValue({ path: '/repo/.keyrules.yaml', warning: 'ignoring "x"' });
    const cap = captureConsole();
    await findConfigCommand('/repo');
    cap.restore();
    expect(cap.warnings).toEqual(['⚠️  ignoring "x"']);
  });

  it('should exit with error when no config exists', async () => {
    mockLookupConfigFile.mockReturnValue({ path: null });
    const cap = captureConsole();
    try {
      await findConfigCommand('/repo');
    } catch (e) {}
    cap.restore();
    expect(mockExit).toHaveBeenCalledWith(1);
    expect(cap.errors).toEqual(['❌ No config file found']);
  });

  it('should output JSON', async () => {
    mockLookupConfigFile.mockReturnValue({ path: null, warning: 'ignoring "x"' });
    const cap = captureConsole();
    try {
      await findConfigCommand('/repo', { json: true });
    } catch (e) {}
    cap.restore();
    expect(JSON.parse(cap.logs.join(''))).toEqual({ path: null, warning: 'ignoring "x"' });
    expect(mockExit).toHaveBeenCalledWith(1);
  });
});

describe('checkCommand', () => {
  it('should report a valid config', async () => {
    const cap = captureConsole();
    await checkCommand({ config: configPath });
    cap.restore();
    expect(mockExit).not.toHaveBeenCalled();
    expect(cap.logs).toEqual([`✅ ${configPath}: 2 creation rule(s), 1 destination rule(s)`]);
  });

  it('should list every problem and exit with error', async () => {
    writeConfig(`
creation_rules:
  - path_regex: "("
    pgp: FPR1
  - encrypted_suffix: _x
    encrypted_regex: ^y
destination_rules:
  - s3_bucket: b
    gcs_bucket: g
`);
    const cap = captureConsole();
    try {
      await checkCommand({ config: configPath, json: true });
    } catch (e) {}
    cap.restore();
    expect(mockExit).toHaveBeenCalledWith(1);
    const parsed = JSON.parse(cap.logs.join(''));
    expect(parsed.valid).toBe(false);
    expect(parsed.errors).toHaveLength(3);
    expect(parsed.errors[0]).toMatch(/^creation_rules\[0\]: Cannot compile path pattern "\(" in rule #1: /);
    expect(parsed.errors[1]).toMatch(/^creation_rules\[1\]: Cannot use more than one of /);
    expect(parsed.errors[2]).toMatch(/^destination_rules\[0\]: More than one destination found/);
  });

  it('should report an invalid deprecated filename_regex', async () => {
    writeConfig('creation_rules:\n  - filename_regex: "(unclosed"\n    pgp: FPR1\n');
    const cap = captureConsole();
    try {
      await checkCommand({ config: configPath, json: true });
    } catch (e) {}
    cap.restore();
    expect(mockExit).toHaveBeenCalledWith(1);
    const parsed = JSON.parse(cap.logs.join(''));
    expect(parsed.valid).toBe(false);
    expect(parsed.errors).toHaveLength(1);
    expect(parsed.errors[0]).toMatch(/^creation_rules\[0\]: Cannot compile path pattern "\(unclosed" in rule #1: /);
  });

  it('should exit with error on an unparsable config', async () => {
    writeConfig('creation_rules: [');
    const cap = captureConsole();
    try {
      await checkCommand({ config: configPath });
    } catch (e) {}
    cap.restore();
    expect(mockExit).toHaveBeenCalledWith(1);
    expect(cap.errors[0]).toMatch(/^❌ Error: Could not parse config file: /);
  });
});
