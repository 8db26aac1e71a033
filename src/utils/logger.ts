/**
 * Switchyard — Logging Utilities
 *
 * Structured logging using Pino with automatic redaction
 * of sensitive fields and consistent formatting.
 *
 * @module utils/logger
 * @version 1.0.0
 */

import pino from 'pino';
import { getConfig } from '../config/config.js';
import { LogLevelSchema } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * SWITCHYARD_LOG_LEVEL wins over the configured level so that tests and
 * one-off CLI runs can quiet the output without touching the config file.
 */
function resolveLevel(explicit?: string): string {
  if (explicit) return explicit;
  const fromEnv = LogLevelSchema.safeParse(process.env.SWITCHYARD_LOG_LEVEL);
  if (fromEnv.success) return fromEnv.data;
  return getConfig().logging.level;
}

export function createLogger(name: string, options?: { level?: string }): pino.Logger {
  const opts: pino.LoggerOptions = {
    name,
    level: resolveLevel(options?.level),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  return pino(opts);
}

// ═══════════════════════════════════════════════════════════════════════════
// PRE-CONFIGURED LOGGERS
// ═══════════════════════════════════════════════════════════════════════════

export const logger = createLogger('switchyard');
export const registryLogger = createLogger('switchyard:registry');
export const orchestratorLogger = createLogger('switchyard:orchestrator');
export const adapterLogger = createLogger('switchyard:adapter');
export const cliLogger = createLogger('switchyard:cli');

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

const SENSITIVE_FIELDS = [
  'password',
  'secret',
  'token',
  'key',
  'auth',
  'credential',
  'api_key',
  'apikey',
  'private',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactValue(value: unknown, fields: readonly string[]): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, fields));
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      result[key] = fields.some((field) => lowerKey.includes(field)) ? '[REDACTED]' : redactValue(inner, fields);
    }
    return result;
  }
  return value;
}

/**
 * Copy of `obj` with every sensitive key masked, at any depth, arrays included.
 * Keys match by case-insensitive substring, so `apiKey` and `Authorization` are caught.
 */
export function redact(
  obj: Record<string, unknown>,
  additionalFields: string[] = [],
): Record<string, unknown> {
  const fields = [...SENSITIVE_FIELDS, ...additionalFields.map((field) => field.toLowerCase())];
  const result = redactValue(obj, fields);
  return isRecord(result) ? result : {};
}

export function formatError(error: unknown): {
  message: string;
  stack?: string;
  code?: string;
  name?: string;
} {
  if (error instanceof Error) {
    const result: { message: string; stack?: string; code?: string; name?: string } = {
      message: error.message,
      name: error.name,
    };
    if (error.stack !== undefined) {
      result.stack = error.stack;
    }
    const code: unknown = Reflect.get(error, 'code');
    if (typeof code === 'string') {
      result.code = code;
    }
    return result;
  }

  return { message: String(error) };
}
