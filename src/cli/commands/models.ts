import { type Command } from 'commander';
import { createOrchestrator } from '../../ai/bootstrap.js';
import { tierName } from '../../ai/tier-policy.js';
import type { ModelDescriptor } from '../../ai/types.js';
import { configFor, parseInteger } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MODELS CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

const HEADER = ['ID', 'BACKEND', 'TIER', 'HEALTH', 'CAPABILITIES'];

export function formatModelTable(models: readonly ModelDescriptor[]): string {
  if (models.length === 0) {
    return 'No models match.';
  }

  const rows = models.map((model) => [
    model.id,
    model.backendKind,
    `${model.requiredTier} ${tierName(model.requiredTier)}`,
    model.health,
    model.capabilities.join(', '),
  ]);

  const widths = HEADER.map((title, col) => Math.max(title.length, ...rows.map((row) => (row[col] ?? '').length)));
  const line = (cells: string[]): string =>
    cells.map((cell, col) => (col === cells.length - 1 ? cell : cell.padEnd(widths[col] ?? 0))).join('  ');

  return [line(HEADER), ...rows.map(line)].join('\n');
}

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('List the configured model catalog')
    .option('-t, --tier <tier>', 'Only models a caller of this tier may use')
    .option('--capability <tag>', 'Only models declaring this task type, best first')
    .option('--json', 'Output as JSON')
    .action((options: { tier?: string; capability?: string; json?: boolean }, command: Command) => {
      try {
        const built = createOrchestrator(configFor(command));
        if (!built.success) {
          process.stderr.write(`${built.error.code}: ${built.error.message}\n`);
          process.exit(1);
        }

        const { orchestrator } = built.data;
        const models = orchestrator.listModels({
          tier: options.tier !== undefined ? parseInteger(options.tier, 'tier') : undefined,
          capability: options.capability,
        });
        orchestrator.close();

        process.stdout.write(
          (options.json ? JSON.stringify(models, null, 2) : formatModelTable(models)) + '\n',
        );
      } catch (error) {
        process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        process.exit(1);
      }
    });
}
