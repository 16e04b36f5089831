/**
 * Configuration system for mailrecall
 *
 * Core configuration loading. Type definitions are in config-types.ts,
 * default values in config-defaults.ts, the schema in config-validation.ts.
 *
 * loadConfig() is called once at process start; the resulting object is
 * passed explicitly to everything that needs it.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { deepMerge, isPlainObject, validateConfig } from './config-validation.js';
import { DEFAULT_CONFIG } from './config-defaults.js';
import { ConfigError, errorMessage } from './errors.js';
import type { MailRecallConfig } from './config-types.js';

export type {
  MailRecallConfig,
  StorageConfig,
  StorageBackendKind,
  RelationalStorageConfig,
  PostgresConfig,
  EmbeddingsConfig,
  LLMConfig,
  IngestConfig,
  WindowConfig,
  RetrievalConfig,
  ErrorReportingConfig,
} from './config-types.js';

export { DEFAULT_CONFIG, DEFAULT_API_URL, DEFAULT_SYSTEM_PROMPT } from './config-defaults.js';

export const CONFIG_DIR_NAME = '.mailrecall';
export const CONFIG_FILE_NAME = 'config.json';

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Applied last, after environment overrides (CLI flags) */
  overrides?: Record<string, unknown>;
}

/**
 * Data directory: MAILRECALL_HOME, else <cwd>/.mailrecall
 */
export function resolveDataDir(cwd: string, env: NodeJS.ProcessEnv): string {
  const fromEnv = env.MAILRECALL_HOME;
  if (fromEnv) return path.resolve(cwd, fromEnv);
  return path.join(cwd, CONFIG_DIR_NAME);
}

export function getGlobalConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot parse config file ${filePath}: ${errorMessage(err)}`, {
      path: filePath,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`, { path: filePath });
  }
  return parsed;
}

/**
 * Environment overrides.
 *
 * DATABASE_URL selects the relational backend on PostgreSQL unless
 * MAILRECALL_BACKEND forces a backend.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const storage: Record<string, unknown> = {};

  if (env.DATABASE_URL) {
    storage.relational = {
      driver: 'postgresql',
      postgresql: { connection_string: env.DATABASE_URL },
    };
    storage.backend = 'relational';
  }
  if (env.MAILRECALL_BACKEND) {
    storage.backend = env.MAILRECALL_BACKEND;
  }
  if (Object.keys(storage).length > 0) {
    overrides.storage = storage;
  }

  if (env.MAILRECALL_EMBEDDINGS_API_KEY) {
    overrides.embeddings = { api_key: env.MAILRECALL_EMBEDDINGS_API_KEY };
  }
  if (env.MAILRECALL_LLM_API_KEY) {
    overrides.llm = { api_key: env.MAILRECALL_LLM_API_KEY };
  }

  return deepMerge(config, overrides);
}

/**
 * Load and validate configuration.
 * Order: defaults -> ~/.mailrecall/config.json -> <data dir>/config.json -> env -> overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): MailRecallConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const dataDir = resolveDataDir(cwd, env);

  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG, data_dir: dataDir };
  merged = deepMerge(merged, readConfigFile(getGlobalConfigPath(options.homeDir)));
  merged = deepMerge(merged, readConfigFile(path.join(dataDir, CONFIG_FILE_NAME)));
  merged = applyEnvOverrides(merged, env);
  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }
  // data_dir is not taken from config files
  merged.data_dir = dataDir;

  return validateConfig(merged);
}

/** Resolve a configured file name against the data directory. */
export function resolveDataPath(config: MailRecallConfig, fileName: string): string {
  return path.isAbsolute(fileName) ? fileName : path.join(config.data_dir, fileName);
}
