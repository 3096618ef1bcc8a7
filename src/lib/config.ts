/**
 * Configuration loading and validation utilities.
 *
 * Resolution order: built-in defaults, then stackctl.config.json (found by
 * walking upward from the working directory), then STACKCTL_* environment
 * variables.
 */

import { access } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { resolveInProject } from './paths.js';
import { validateBundled } from './schema.js';
import { CONFIG_FILE_NAME, ENV_PREFIX } from './branding.js';
import type { StackConfig, StackConfigFile } from '../types/config.js';

export { CONFIG_FILE_NAME };

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Defaults mirror the layout of the stack this tool was built for: a web dev
 * server on 3000-3002, a pipeline runner, and the database under data/.
 */
export const DEFAULT_CONFIG: Omit<StackConfig, 'root' | 'config_path'> = {
  version: 1,
  system_name: 'letters',
  embedded: { db_path: 'data/letters.db' },
  server: { host: 'localhost', port: 5432, user: 'postgres', database: 'letters_dev' },
  backup_dir: 'data/backups',
  selection_file: 'data/backend-selection.json',
  default_backend: 'embedded',
  ports: [3000, 3001, 3002],
  patterns: {
    web: ['next dev', 'npm run dev'],
    pipeline: ['production_pipeline'],
    'generic-app': ['letters_app'],
  },
  settle_ms: 2000,
  command_timeout_ms: 10_000,
  export_timeout_ms: 15 * 60_000,
};

/**
 * Searches for a configuration file by walking upward from `startDir`.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Keep walking up.
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[`${ENV_PREFIX}${name}`];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

function envInteger(env: NodeJS.ProcessEnv, name: string, min: number, max: number): number | undefined {
  const raw = envValue(env, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be an integer, got '${raw}'`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

/**
 * Parses STACKCTL_PORTS ("3000,3001, 3002").
 */
export function parsePortList(raw: string): number[] {
  const ports: number[] = [];
  for (const part of raw.split(',')) {
    const token = part.trim();
    if (token === '') continue;
    if (!/^\d+$/.test(token)) {
      throw new ConfigError(`${ENV_PREFIX}PORTS contains a non-numeric port: '${token}'`);
    }
    const port = Number.parseInt(token, 10);
    if (port < 1 || port > 65535) {
      throw new ConfigError(`${ENV_PREFIX}PORTS contains an out-of-range port: ${port}`);
    }
    if (!ports.includes(port)) ports.push(port);
  }
  return ports;
}

/**
 * Applies STACKCTL_* overrides on top of a file-level config.
 */
export function applyEnvOverrides(file: StackConfigFile, env: NodeJS.ProcessEnv): StackConfigFile {
  const merged: StackConfigFile = {
    ...file,
    embedded: { ...file.embedded },
    server: { ...file.server },
  };

  const dbPath = envValue(env, 'DB_PATH');
  if (dbPath) merged.embedded = { ...merged.embedded, db_path: dbPath };

  const backupDir = envValue(env, 'BACKUP_DIR');
  if (backupDir) merged.backup_dir = backupDir;

  const ports = envValue(env, 'PORTS');
  if (ports) merged.ports = parsePortList(ports);

  const settle = envInteger(env, 'SETTLE_MS', 0, 60_000);
  if (settle !== undefined) merged.settle_ms = settle;

  const host = envValue(env, 'PG_HOST');
  if (host) merged.server = { ...merged.server, host };
  const port = envInteger(env, 'PG_PORT', 1, 65535);
  if (port !== undefined) merged.server = { ...merged.server, port };
  const user = envValue(env, 'PG_USER');
  if (user) merged.server = { ...merged.server, user };
  const database = envValue(env, 'PG_DATABASE');
  if (database) merged.server = { ...merged.server, database };
  const binDir = envValue(env, 'PG_BIN_DIR');
  if (binDir) merged.server = { ...merged.server, bin_dir: binDir };

  return merged;
}

/**
 * Merges a validated file config over the defaults and resolves every path
 * against `root`.
 */
export function resolveConfig(file: StackConfigFile, root: string, configPath: string | null): StackConfig {
  const server = { ...DEFAULT_CONFIG.server, ...file.server };
  return {
    version: 1,
    system_name: file.system_name ?? DEFAULT_CONFIG.system_name,
    embedded: {
      db_path: resolveInProject(root, file.embedded?.db_path ?? DEFAULT_CONFIG.embedded.db_path),
    },
    server: server.bin_dir ? { ...server, bin_dir: resolveInProject(root, server.bin_dir) } : server,
    backup_dir: resolveInProject(root, file.backup_dir ?? DEFAULT_CONFIG.backup_dir),
    selection_file: resolveInProject(root, file.selection_file ?? DEFAULT_CONFIG.selection_file),
    default_backend: file.default_backend ?? DEFAULT_CONFIG.default_backend,
    ports: file.ports ?? [...DEFAULT_CONFIG.ports],
    patterns: {
      web: file.patterns?.web ?? [...DEFAULT_CONFIG.patterns.web],
      pipeline: file.patterns?.pipeline ?? [...DEFAULT_CONFIG.patterns.pipeline],
      'generic-app': file.patterns?.['generic-app'] ?? [...DEFAULT_CONFIG.patterns['generic-app']],
    },
    settle_ms: file.settle_ms ?? DEFAULT_CONFIG.settle_ms,
    command_timeout_ms: file.command_timeout_ms ?? DEFAULT_CONFIG.command_timeout_ms,
    export_timeout_ms: file.export_timeout_ms ?? DEFAULT_CONFIG.export_timeout_ms,
    root,
    config_path: configPath,
  };
}

export interface LoadConfigOptions {
  /** Explicit config path (--config). No upward search when given. */
  configPath?: string;
  /** Directory to search from and to resolve paths against when no file exists */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads, validates and resolves the configuration.
 *
 * @throws {ConfigError} If an explicit config file is missing, or any file or
 *   environment value is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const config = await loadConfig({ configPath: './stackctl.config.json' });
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StackConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let configPath: string | null;
  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
  } else {
    configPath = await findConfigFile(cwd);
  }

  let file: StackConfigFile = { version: 1 };
  if (configPath) {
    let raw: unknown;
    try {
      raw = await atomicReadJson<unknown>(configPath);
    } catch (error) {
      if (error instanceof AtomicFsError) {
        throw new ConfigError(`Failed to read configuration file: ${error.message}`, configPath, error);
      }
      throw error;
    }

    const result = await validateBundled<StackConfigFile>(raw, 'stackctl.config.schema.json');
    if (!result.valid || !result.data) {
      throw new ConfigError(
        `Invalid configuration file ${configPath}: ${result.errors.join('; ')}`,
        configPath
      );
    }
    file = result.data;
  }

  const root = configPath ? dirname(configPath) : resolve(cwd);
  return resolveConfig(applyEnvOverrides(file, env), root, configPath);
}
