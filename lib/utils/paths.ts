import fs from 'fs';
import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError, StorageError, ValidationError } from '@/lib/errors';

export const STORAGE_MODES = ['centralized', 'per-project'] as const;
export type StorageMode = (typeof STORAGE_MODES)[number];

export const PROJECT_DATA_SUBDIR = 'chronolog-data';
const LEGACY_STORE_FILE = 'time_server_data.json';
const LEGACY_DATA_SUBDIR = 'chronos-data';
const WRITE_TEST_FILE = '.write_test';

export type DataDirSource =
  | 'explicit-data-dir'
  | 'explicit-project-root'
  | 'env:CHRONOLOG_DATA_DIR'
  | 'env:MCP_PROJECT_ROOT'
  | 'env:PROJECT_ROOT'
  | 'env:MCP_DATA_DIR'
  | 'cwd'
  | 'default';

export interface StorageLocation {
  mode: StorageMode;
  dataDir: string;
  source: DataDirSource;
}

export interface StorageLocatorOptions {
  storageMode: StorageMode;
  dataDir?: string;
  projectRoot?: string;
}

type Env = Record<string, string | undefined>;

export function normalizeStorageMode(value: string): StorageMode {
  const normalized = value.trim().toLowerCase().replace(/_/g, '-');
  const mode = STORAGE_MODES.find((candidate) => candidate === normalized);
  if (!mode) {
    throw new ConfigurationError(
      `Invalid storage mode: '${value}'. Must be '${STORAGE_MODES[0]}' or '${STORAGE_MODES[1]}'`,
      { storageMode: value }
    );
  }
  return mode;
}

function expandHome(value: string, env: Env): string {
  if (value === '~') {
    return env.HOME || os.homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(env.HOME || os.homedir(), value.slice(2));
  }
  return value;
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Picks the store directory. First match wins: explicit directory, explicit
 * project root, environment, then the mode's default.
 */
export function resolveDataDir(
  options: StorageLocatorOptions,
  env: Env = process.env,
  cwd: string = process.cwd()
): StorageLocation {
  const mode = options.storageMode;
  const located = (dir: string, source: DataDirSource): StorageLocation => ({
    mode,
    dataDir: path.resolve(cwd, dir),
    source,
  });

  if (options.dataDir) {
    return located(expandHome(options.dataDir, env), 'explicit-data-dir');
  }

  if (options.projectRoot) {
    const root = path.resolve(cwd, expandHome(options.projectRoot, env));
    if (!fs.existsSync(root)) {
      throw new ValidationError(`Specified project root does not exist: ${root}`, { projectRoot: root });
    }
    if (!isDirectory(root)) {
      throw new ValidationError(`Specified project root is not a directory: ${root}`, { projectRoot: root });
    }
    return located(path.join(root, PROJECT_DATA_SUBDIR), 'explicit-project-root');
  }

  if (env.CHRONOLOG_DATA_DIR) {
    return located(expandHome(env.CHRONOLOG_DATA_DIR, env), 'env:CHRONOLOG_DATA_DIR');
  }

  if (mode === 'per-project') {
    const projectRootVars: Array<[string, DataDirSource]> = [
      ['MCP_PROJECT_ROOT', 'env:MCP_PROJECT_ROOT'],
      ['PROJECT_ROOT', 'env:PROJECT_ROOT'],
    ];
    for (const [name, source] of projectRootVars) {
      const value = env[name];
      if (!value) continue;
      const root = path.resolve(cwd, expandHome(value, env));
      if (isDirectory(root)) {
        return located(path.join(root, PROJECT_DATA_SUBDIR), source);
      }
      console.warn(`${name} is set but is not an existing directory, ignoring: ${value}`);
    }
    return located(path.join(cwd, PROJECT_DATA_SUBDIR), 'cwd');
  }

  if (env.MCP_DATA_DIR) {
    return located(expandHome(env.MCP_DATA_DIR, env), 'env:MCP_DATA_DIR');
  }
  return located(path.join(env.HOME || os.homedir(), '.chronolog', 'data'), 'default');
}

const PROJECT_SOURCES: readonly DataDirSource[] = [
  'explicit-project-root',
  'env:MCP_PROJECT_ROOT',
  'env:PROJECT_ROOT',
  'cwd',
];

/**
 * Where a store written by the earlier list-layout server may live for this
 * location: beside the new store, or in that server's own default directory.
 */
export function legacyStoreCandidates(location: StorageLocation, cwd: string = process.cwd()): string[] {
  const candidates = [path.join(location.dataDir, LEGACY_STORE_FILE)];
  if (PROJECT_SOURCES.includes(location.source)) {
    candidates.push(path.join(path.dirname(location.dataDir), LEGACY_DATA_SUBDIR, LEGACY_STORE_FILE));
  } else if (location.source === 'default') {
    candidates.push(path.resolve(cwd, LEGACY_DATA_SUBDIR, LEGACY_STORE_FILE));
  }
  return [...new Set(candidates)];
}

/** Creates the directory if needed and proves it is writable. */
export async function prepareDataDir(dataDir: string): Promise<void> {
  const testFile = path.join(dataDir, WRITE_TEST_FILE);
  try {
    await fsp.mkdir(dataDir, { recursive: true });
    await fsp.writeFile(testFile, 'test', 'utf-8');
    await fsp.unlink(testFile);
  } catch (error) {
    throw new StorageError(
      `Data directory is not writable: ${dataDir}. Check path validity and permissions.`,
      dataDir,
      error
    );
  }
}

export async function locateStorage(
  options: StorageLocatorOptions,
  env: Env = process.env,
  cwd: string = process.cwd()
): Promise<StorageLocation> {
  const location = resolveDataDir(options, env, cwd);
  await prepareDataDir(location.dataDir);
  return location;
}
