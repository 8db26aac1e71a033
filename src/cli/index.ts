#!/usr/bin/env node

/**
 * Switchyard — Command Line Interface
 *
 * Inspect the model catalog and run one-off queries through the
 * orchestrator.
 *
 * @module cli
 * @version 0.1.0
 */

import { Command } from 'commander';
import { registerConfigCommands } from './commands/config.js';
import { registerModelsCommand } from './commands/models.js';
import { registerQueryCommand } from './commands/query.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('switchyard')
  .description('Switchyard — tier-aware routing across local model backends')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: ~/.switchyard/config.json)');

registerModelsCommand(program);
registerQueryCommand(program);
registerConfigCommands(program);

// ═══════════════════════════════════════════════════════════════════════════
// PARSE & EXECUTE
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync(process.argv);
