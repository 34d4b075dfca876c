/**
 * Config file discovery and config-relative paths
 */

import fs from 'fs';
import path from 'path';
import { PolicyError, PolicyErrorCode } from './errors';

export const CONFIG_FILE_NAME = '.keyrules.yaml';
export const ALTERNATE_CONFIG_NAME = '.keyrules.yml';

/** Maximum number of parent directories searched */
export const MAX_LOOKUP_DEPTH = 100;

/**
 * File-system capability used by the lookup. Injected so tests can run
 * against an in-memory tree.
 */
export interface FileSystem {
  /** Stat `filePath`, or undefined when nothing exists there */
  stat(filePath: string): FileStat | undefined;
}

export type FileStat = Pick<fs.Stats, 'isFile' | 'isDirectory'>;

export const nodeFileSystem: FileSystem = {
  stat(filePath: string): FileStat | undefined {
    return fs.statSync(filePath, { throwIfNoEntry: false });
  },
};

export interface ConfigLookupResult {
  /** Path of the config file found, or null */
  path: string | null;
  /** Set when a misnamed config file was seen on the way */
  warning?: string;
}

/**
 * Look for a config file in the directory of `start` and its parents.
 * Misnamed `.keyrules.yml` files are never used, but reported.
 */
export function lookupConfigFile(start: string, fileSystem: FileSystem = nodeFileSystem): ConfigLookupResult {
  let dir = path.dirname(start);
  let alternate: string | undefined;

  for (let i = 0; i < MAX_LOOKUP_DEPTH; i++) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fileSystem.stat(candidate)) {
      const result: ConfigLookupResult = { path: candidate };
      if (alternate) {
        result.warning =
          `ignoring "${alternate}" when searching for config file; the config file must be called ` +
          `"${CONFIG_FILE_NAME}"; using "${candidate}" instead`;
      }
      return result;
    }

    if (!alternate) {
      const alt = path.join(dir, ALTERNATE_CONFIG_NAME);
      if (fileSystem.stat(alt)) alternate = alt;
    }

    dir = path.join(dir, '..');
  }

  const result: ConfigLookupResult = { path: null };
  if (alternate) {
    result.warning =
      `ignoring "${alternate}" when searching for config file; the config file must be called "${CONFIG_FILE_NAME}"`;
  }
  return result;
}

/**
 * Like lookupConfigFile, but fails when nothing is found. Warnings are
 * printed to stderr.
 *
 * @throws PolicyError with CONFIG_NOT_FOUND
 */
export function findConfigFile(start: string, fileSystem: FileSystem = nodeFileSystem): string {
  const result = lookupConfigFile(start, fileSystem);
  if (result.warning) {
    console.warn(`⚠️  ${result.warning}`);
  }
  if (!result.path) {
    throw new PolicyError(
      PolicyErrorCode.CONFIG_NOT_FOUND,
      `No ${CONFIG_FILE_NAME} found in "${path.dirname(start)}" or its parent directories`,
      { value: start }
    );
  }
  return result.path;
}

/**
 * Path of `filePath` relative to the directory holding the config file.
 * Paths outside that directory are returned unchanged.
 */
export function relativeToConfigDir(configPath: string, filePath: string): string {
  const configDir = path.resolve(path.dirname(configPath));
  const prefix = configDir.endsWith(path.sep) ? configDir : configDir + path.sep;
  return filePath.startsWith(prefix) ? filePath.slice(prefix.length) : filePath;
}
