import { type Command } from 'commander';
import { createOrchestrator } from '../../ai/bootstrap.js';
import type { QueryParameters, QueryRequest } from '../../ai/types.js';
import { cliLogger as log } from '../../utils/logger.js';
import { configFor, parseInteger, parseNumber } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export interface QueryCommandOptions {
  tier: string;
  model?: string;
  task?: string;
  system?: string;
  temperature?: string;
  maxTokens?: string;
  timeout?: string;
}

/**
 * Turn command-line strings into a query request. Range checks are left to
 * the orchestrator's request schema.
 */
export function buildQueryRequest(input: string, options: QueryCommandOptions): QueryRequest {
  const parameters: QueryParameters = {};
  if (options.temperature !== undefined) parameters.temperature = parseNumber(options.temperature, 'temperature');
  if (options.maxTokens !== undefined) parameters.maxTokens = parseInteger(options.maxTokens, 'max-tokens');
  if (options.system !== undefined) parameters.system = options.system;

  return {
    input,
    callerTier: parseInteger(options.tier, 'tier'),
    ...(options.model !== undefined ? { modelId: options.model } : {}),
    ...(options.task !== undefined ? { taskType: options.task } : {}),
    ...(Object.keys(parameters).length > 0 ? { parameters } : {}),
    ...(options.timeout !== undefined ? { timeoutMs: parseInteger(options.timeout, 'timeout') } : {}),
  };
}

export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run one query through the orchestrator')
    .argument('<input>', 'Text to send')
    .requiredOption('-t, --tier <tier>', 'Caller tier (0-4)')
    .option('-m, --model <id>', 'Use this model instead of auto-selection')
    .option('--task <type>', 'Task type hint (default: inferred from the input)')
    .option('-s, --system <prompt>', 'System prompt')
    .option('--temperature <t>', 'Sampling temperature (0-2)')
    .option('--max-tokens <n>', 'Cap on generated tokens')
    .option('--timeout <ms>', 'Per-call timeout in milliseconds')
    .action(async (input: string, options: QueryCommandOptions, command: Command) => {
      try {
        const built = createOrchestrator(configFor(command));
        if (!built.success) {
          process.stderr.write(`${built.error.code}: ${built.error.message}\n`);
          process.exit(1);
        }

        const { orchestrator } = built.data;
        const request = buildQueryRequest(input, options);
        log.debug({ inputLength: input.length, model: request.modelId, task: request.taskType }, 'CLI query');

        const result = await orchestrator.query(request);
        orchestrator.close();

        if (!result.success) {
          process.stderr.write(`${result.error.code}: ${result.error.message}\n`);
          process.exit(1);
        }

        process.stdout.write(JSON.stringify(result.data, null, 2) + '\n');
      } catch (error) {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
      }
    });
}
