/**
 * Switchyard — Main Exports
 *
 * Public API surface for the library.
 *
 * @module switchyard
 * @version 0.1.0
 */

// Types
export {
  type Config,
  type LogLevel,
  type TierOrder,
  type RecoveryMode,
  type Result,
  ConfigSchema,
  MAX_TIMEOUT_MS,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Config
export {
  getConfig,
  loadConfig,
  saveConfig,
  reloadConfig,
  clearConfigCache,
  ensureDirectories,
  DEFAULT_CONFIG,
  getBaseDir,
  getConfigPath,
  getLogsPath,
  getPath,
  expandPath,
} from './config/config.js';

// Events
export { EventBus, type EventMap } from './kernel/event-bus.js';

// Ollama runtime
export { OllamaClient, OllamaApiError } from './integrations/ollama/client.js';

// Orchestration core
export * from './ai/index.js';

// Logging
export { createLogger, logger, redact, formatError } from './utils/logger.js';
