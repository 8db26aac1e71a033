/**
 * Switchyard — Configuration Management
 *
 * Reads `~/.switchyard/config.json`, layers it over DEFAULT_CONFIG and
 * validates the result. The orchestration core never reads configuration
 * itself; the bootstrap layer resolves it here and passes plain values in.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, type Result, ok, err } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CONFIG: Config = {
  logging: {
    level: 'info',
  },
  paths: {
    base_dir: path.join(os.homedir(), '.switchyard'),
    config_file: 'config.json',
    log_dir: 'logs',
  },
  orchestrator: {
    failure_threshold: 3,
    default_timeout_ms: 30_000,
    tier_order: 'ascending',
    recovery: {
      mode: 'manual',
      probe_interval_ms: 60_000,
    },
  },
  backends: {
    ollama_url: 'http://127.0.0.1:11434',
  },
};

type PathSettings = Config['paths'];

const PRIVATE_DIR_MODE = 0o700;
const PRIVATE_FILE_MODE = 0o600;

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath === '~') return os.homedir();
  return inputPath.startsWith('~/') ? path.join(os.homedir(), inputPath.slice(2)) : inputPath;
}

function pathSetting(key: keyof PathSettings, config?: Partial<Config>): string {
  return config?.paths?.[key] ?? DEFAULT_CONFIG.paths[key];
}

export function getBaseDir(config?: Partial<Config>): string {
  return expandPath(pathSetting('base_dir', config));
}

/** Resolve a path under the base directory; absolute paths are kept as given. */
export function getPath(relativePath: string, config?: Partial<Config>): string {
  const expanded = expandPath(relativePath);
  return path.isAbsolute(expanded) ? expanded : path.join(getBaseDir(config), expanded);
}

export function getLogsPath(config?: Partial<Config>): string {
  return getPath(pathSetting('log_dir', config), config);
}

export function getConfigPath(config?: Partial<Config>): string {
  return getPath(pathSetting('config_file', config), config);
}

// ═══════════════════════════════════════════════════════════════════════════
// DIRECTORY MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function ensureDirectories(config?: Partial<Config>): Result<void, Error> {
  try {
    for (const dir of [getBaseDir(config), getLogsPath(config)]) {
      fs.mkdirSync(dir, { recursive: true, mode: PRIVATE_DIR_MODE });
    }
    return ok(undefined);
  } catch (error) {
    return err(toError(error));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from the file replace the default. */
function mergeOver(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeOver(current, value) : value;
  }

  return merged;
}

function readConfigFile(file: string): Result<Record<string, unknown>, Error> {
  if (!fs.existsSync(file)) {
    return ok({});
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (!isPlainObject(parsed)) {
    return err(new Error(`Invalid configuration: ${file} must contain a JSON object`));
  }
  return ok(parsed);
}

/**
 * Load configuration from file, merged over the defaults.
 * A missing file yields the defaults; an unreadable or invalid one is an error.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const file = expandPath(customPath ?? getConfigPath());
    const fromFile = readConfigFile(file);
    if (!fromFile.success) {
      return fromFile;
    }

    const result = ConfigSchema.safeParse(mergeOver(DEFAULT_CONFIG, fromFile.data));
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(toError(error));
  }
}

export function saveConfig(config: Config, customPath?: string): Result<void, Error> {
  try {
    const file = expandPath(customPath ?? getConfigPath(config));
    fs.mkdirSync(path.dirname(file), { recursive: true, mode: PRIVATE_DIR_MODE });
    fs.writeFileSync(file, JSON.stringify(config, null, 2), { mode: PRIVATE_FILE_MODE, encoding: 'utf-8' });
    return ok(undefined);
  } catch (error) {
    return err(toError(error));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PROCESS-WIDE CACHE
// ═══════════════════════════════════════════════════════════════════════════
// Only the logger reads through the cache; everything else is handed a Config.

let cachedConfig: Config | null = null;

/** Cached configuration; falls back to the defaults when the file is unusable. */
export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function reloadConfig(customPath?: string): Result<Config, Error> {
  clearConfigCache();
  const result = loadConfig(customPath);
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}
