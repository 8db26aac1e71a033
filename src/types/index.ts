/**
 * Switchyard — Core Type Definitions
 *
 * Configuration schema and the Result type shared by every layer.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const TierOrderSchema = z.enum(['ascending', 'descending']);
export type TierOrder = z.infer<typeof TierOrderSchema>;

export const RecoveryModeSchema = z.enum(['manual', 'probe']);
export type RecoveryMode = z.infer<typeof RecoveryModeSchema>;

/** Largest delay a Node timer honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema.default('info'),
  }),
  paths: z.object({
    base_dir: z.string().default('~/.switchyard'),
    config_file: z.string().default('config.json'),
    log_dir: z.string().default('logs'),
  }),
  orchestrator: z.object({
    failure_threshold: z.number().int().positive().default(3),
    default_timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000),
    tier_order: TierOrderSchema.default('ascending'),
    recovery: z.object({
      mode: RecoveryModeSchema.default('manual'),
      probe_interval_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).default(60_000),
    }),
  }),
  backends: z.object({
    ollama_url: z.string().url().default('http://127.0.0.1:11434'),
    classifier_url: z.string().url().optional(),
  }),
  // Registration entries; validated by the catalog loader against the model schema
  models: z.array(z.record(z.string(), z.unknown())).optional(),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { success: true; data: T } {
  return result.success;
}

export function isErr<T, E>(result: Result<T, E>): result is { success: false; error: E } {
  return !result.success;
}
