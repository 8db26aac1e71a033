import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { BackendAdapter } from '../../../src/ai/adapters/types.js';
import { ModelRegistry } from '../../../src/ai/model-registry.js';
import { ManualRecoveryPolicy, ProbeRecoveryPolicy, type RecoveryContext } from '../../../src/ai/recovery.js';

function stubAdapter(probe?: BackendAdapter['probe']): BackendAdapter {
  return {
    kind: 'general-model',
    invoke: vi.fn(),
    ...(probe ? { probe } : {}),
  };
}

describe('recovery policies', () => {
  let registry: ModelRegistry;

  beforeEach(() => {
    registry = new ModelRegistry();
    registry.register({ id: 'a', backendKind: 'general-model', requiredTier: 1, capabilities: ['chat'] });
    registry.register({ id: 'b', backendKind: 'general-model', requiredTier: 1, capabilities: ['chat'] });
    registry.setHealth('a', 'unavailable');
  });

  function context(adapter: BackendAdapter): RecoveryContext {
    return {
      registry,
      adapters: { 'general-model': adapter },
      restore: (id) => {
        registry.setHealth(id, 'healthy');
      },
    };
  }

  describe('ManualRecoveryPolicy', () => {
    it('should leave unavailable models alone', () => {
      const policy = new ManualRecoveryPolicy();
      policy.start();
      policy.stop();

      const a = registry.lookup('a');
      expect(a.success && a.data.health).toBe('unavailable');
    });
  });

  describe('ProbeRecoveryPolicy', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should restore unavailable models whose probe succeeds', async () => {
      const probe = vi.fn().mockResolvedValue(true);
      const policy = new ProbeRecoveryPolicy({ intervalMs: 1000 });

      const restored = await policy.sweep(context(stubAdapter(probe)));

      expect(restored).toEqual(['a']);
      expect(probe).toHaveBeenCalledTimes(1);
      const a = registry.lookup('a');
      expect(a.success && a.data.health).toBe('healthy');
    });

    it('should leave models unavailable when the probe fails or throws', async () => {
      const policy = new ProbeRecoveryPolicy({ intervalMs: 1000 });

      expect(await policy.sweep(context(stubAdapter(vi.fn().mockResolvedValue(false))))).toEqual([]);
      expect(await policy.sweep(context(stubAdapter(vi.fn().mockRejectedValue(new Error('down')))))).toEqual([]);

      const a = registry.lookup('a');
      expect(a.success && a.data.health).toBe('unavailable');
    });

    it('should skip models whose adapter cannot probe', async () => {
      const policy = new ProbeRecoveryPolicy({ intervalMs: 1000 });
      expect(await policy.sweep(context(stubAdapter()))).toEqual([]);
    });

    it('should sweep on every interval until stopped', async () => {
      vi.useFakeTimers();
      const probe = vi.fn().mockResolvedValue(false);
      const policy = new ProbeRecoveryPolicy({ intervalMs: 1000 });

      policy.start(context(stubAdapter(probe)));
      await vi.advanceTimersByTimeAsync(2500);
      expect(probe).toHaveBeenCalledTimes(2);

      policy.stop();
      await vi.advanceTimersByTimeAsync(5000);
      expect(probe).toHaveBeenCalledTimes(2);
    });
  });
});
