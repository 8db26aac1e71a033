import { describe, it, expect } from 'vitest';
import { formatModelTable } from '../../../src/cli/commands/models.js';
import type { ModelDescriptor } from '../../../src/ai/types.js';

const llama2: ModelDescriptor = {
  id: 'llama2',
  backendKind: 'general-model',
  requiredTier: 1,
  capabilities: ['chat', 'analyze'],
  health: 'healthy',
};

const llava: ModelDescriptor = {
  id: 'llava',
  backendKind: 'vision',
  requiredTier: 3,
  capabilities: ['vision'],
  health: 'degraded',
};

describe('formatModelTable', () => {
  it('should print a placeholder when nothing matches', () => {
    expect(formatModelTable([])).toBe('No models match.');
  });

  it('should align columns to the widest cell', () => {
    const lines = formatModelTable([llama2, llava]).split('\n');

    expect(lines).toEqual([
      'ID      BACKEND        TIER      HEALTH    CAPABILITIES',
      'llama2  general-model  1 BASIC   healthy   chat, analyze',
      'llava   vision         3 VISION  degraded  vision',
    ]);
  });

  it('should keep one row per model in the given order', () => {
    const lines = formatModelTable([llava, llama2]).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[1]?.startsWith('llava ')).toBe(true);
    expect(lines[2]?.startsWith('llama2 ')).toBe(true);
  });
});
