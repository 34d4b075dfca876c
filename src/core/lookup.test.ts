/**
 * Tests for config discovery
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  lookupConfigFile,
  findConfigFile,
  relativeToConfigDir,
  FileSystem,
  MAX_LOOKUP_DEPTH,
} from './lookup';
import { PolicyErrorCode } from './errors';

// In-memory tree: every listed path is a file
function fakeFileSystem(files: string[]): FileSystem & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    stat(filePath: string) {
      calls.push(filePath);
      if (!files.includes(filePath)) return undefined;
      return { isFile: () => true, isDirectory: () => false };
    },
  };
}

describe('lookupConfigFile', () => {
  it('finds a config beside the start file', () => {
    const fs = fakeFileSystem(['/repo/sub/.keyrules.yaml']);
    expect(lookupConfigFile('/repo/sub/file.yaml', fs)).toEqual({ path: '/repo/sub/.keyrules.yaml' });
  });

  it('walks up to a parent directory', () => {
    const fs = fakeFileSystem(['/repo/.keyrules.yaml']);
    expect(lookupConfigFile('/repo/a/b/file.yaml', fs).path).toBe('/repo/.keyrules.yaml');
  });

  it('prefers the nearest config', () => {
    const fs = fakeFileSystem(['/repo/.keyrules.yaml', '/repo/a/.keyrules.yaml']);
    expect(lookupConfigFile('/repo/a/b/file.yaml', fs).path).toBe('/repo/a/.keyrules.yaml');
  });

  it('returns null when nothing is found', () => {
    expect(lookupConfigFile('/repo/file.yaml', fakeFileSystem([]))).toEqual({ path: null });
  });

  it('stops after the maximum depth', () => {
    const fs = fakeFileSystem([]);
    lookupConfigFile('/repo/file.yaml', fs);
    expect(fs.calls).toHaveLength(MAX_LOOKUP_DEPTH * 2);
  });

  it('reports a misnamed config it skipped', () => {
    const fs = fakeFileSystem(['/repo/a/.keyrules.yml', '/repo/.keyrules.yaml']);
    expect(lookupConfigFile('/repo/a/file.yaml', fs)).toEqual({
      path: '/repo/.keyrules.yaml',
      warning:
        'ignoring "/repo/a/.keyrules.yml" when searching for config file; the config file must be called ' +
        '".keyrules.yaml"; using "/repo/.keyrules.yaml" instead',
    });
  });

  it('reports a misnamed config when nothing else is found', () => {
    const fs = fakeFileSystem(['/repo/.keyrules.yml']);
    expect(lookupConfigFile('/repo/file.yaml', fs)).toEqual({
      path: null,
      warning: 'ignoring "/repo/.keyrules.yml" when searching for config file; the config file must be called ".keyrules.yaml"',
    });
  });
});

describe('findConfigFile', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the path found', () => {
    const fs = fakeFileSystem(['/repo/.keyrules.yaml']);
    expect(findConfigFile('/repo/file.yaml', fs)).toBe('/repo/.keyrules.yaml');
  });

  it('prints the lookup warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fs = fakeFileSystem(['/repo/a/.keyrules.yml', '/repo/.keyrules.yaml']);
    findConfigFile('/repo/a/file.yaml', fs);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^⚠️ {2}ignoring "\/repo\/a\/\.keyrules\.yml"/);
  });

  it('fails with CONFIG_NOT_FOUND', () => {
    try {
      findConfigFile('/repo/sub/file.yaml', fakeFileSystem([]));
      expect.fail('expected CONFIG_NOT_FOUND');
    } catch (err) {
      expect(err).toMatchObject({
        code: PolicyErrorCode.CONFIG_NOT_FOUND,
        message: 'No .keyrules.yaml found in "/repo/sub" or its parent directories',
      });
    }
  });
});

describe('relativeToConfigDir', () => {
  it('strips the config directory', () => {
    expect(relativeToConfigDir('/repo/.keyrules.yaml', '/repo/secrets/app.yaml')).toBe('secrets/app.yaml');
  });

  it('leaves paths outside the config directory unchanged', () => {
    expect(relativeToConfigDir('/repo/.keyrules.yaml', '/other/app.yaml')).toBe('/other/app.yaml');
  });

  it('does not strip a sibling directory sharing the prefix', () => {
    expect(relativeToConfigDir('/repo/.keyrules.yaml', '/repository/app.yaml')).toBe('/repository/app.yaml');
  });

  it('handles a config at the file-system root', () => {
    expect(relativeToConfigDir('/.keyrules.yaml', '/app.yaml')).toBe('app.yaml');
  });
});
