import { type Command } from 'commander';
import * as fs from 'node:fs';
import {
  ensureDirectories,
  expandPath,
  getBaseDir,
  getConfigPath,
  getLogsPath,
  saveConfig,
} from '../../config/config.js';
import type { Config } from '../../types/index.js';
import { redact } from '../../utils/logger.js';
import { configFor } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INIT + CONFIG CLI COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

/** Effective configuration as printed by `config show`. */
export function renderConfig(config: Config): string {
  return JSON.stringify(redact(config), null, 2);
}

export function registerConfigCommands(program: Command): void {
  program
    .command('init')
    .description('Create the data directory and a default config file')
    .action((_options: Record<string, never>, command: Command) => {
      const config = configFor(command);
      const configPath = command.optsWithGlobals<{ config?: string }>().config ?? getConfigPath(config);

      const dirs = ensureDirectories(config);
      if (!dirs.success) {
        process.stderr.write(`Failed to initialize: ${dirs.error.message}\n`);
        process.exit(1);
      }

      if (fs.existsSync(expandPath(configPath))) {
        process.stdout.write(`Config already exists: ${expandPath(configPath)}\n`);
      } else {
        const saved = saveConfig(config, configPath);
        if (!saved.success) {
          process.stderr.write(`Failed to write config: ${saved.error.message}\n`);
          process.exit(1);
        }
        process.stdout.write(`Wrote ${expandPath(configPath)}\n`);
      }

      process.stdout.write(`  Base directory: ${getBaseDir(config)}\n`);
      process.stdout.write(`  Logs directory: ${getLogsPath(config)}\n`);
    });

  const configCmd = program.command('config').description('Inspect configuration');

  configCmd
    .command('show')
    .description('Print the effective configuration, secrets redacted')
    .action((_options: Record<string, never>, command: Command) => {
      process.stdout.write(renderConfig(configFor(command)) + '\n');
    });
}
