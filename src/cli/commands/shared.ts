import { type Command } from 'commander';
import { loadConfig } from '../../config/config.js';
import type { Config } from '../../types/index.js';

/** Config for a command: --config on the root program, else the default location. */
export function configFor(command: Command): Config {
  const root = command.optsWithGlobals<{ config?: string }>();
  const result = loadConfig(root.config);
  if (!result.success) {
    process.stderr.write(`Error: ${result.error.message}\n`);
    process.exit(1);
  }
  return result.data;
}

export function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function parseInteger(value: string, name: string): number {
  const parsed = parseNumber(value, name);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}
