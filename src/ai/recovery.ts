import { MAX_TIMEOUT_MS } from '../types/index.js';
import { orchestratorLogger as log, formatError } from '../utils/logger.js';
import type { AdapterSet } from './adapters/types.js';
import type { ModelRegistry } from './model-registry.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH RECOVERY POLICIES
// ═══════════════════════════════════════════════════════════════════════════════
//
// A model marked unavailable stays out of auto-selection until something
// says it is healthy again. What that something is differs per deployment,
// so it is a policy the orchestrator is handed rather than a fixed timeout.
//
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecoveryContext {
  registry: ModelRegistry;
  adapters: AdapterSet;
  /** Mark a model healthy and clear its failure history */
  restore(modelId: string): void;
}

export interface HealthRecoveryPolicy {
  start(context: RecoveryContext): void;
  stop(): void;
}

/**
 * Recovery only by operator action: registry.setHealth(id, 'healthy') or
 * AIOrchestrator.restoreHealth(id).
 */
export class ManualRecoveryPolicy implements HealthRecoveryPolicy {
  start(): void {}
  stop(): void {}
}

export interface ProbeRecoveryOptions {
  intervalMs: number;
  /** Per-probe budget (default: 5000) */
  probeTimeoutMs?: number;
}

/**
 * Periodically probes every unavailable model through its adapter and
 * restores the ones that answer. Models whose adapter cannot probe are left
 * for an operator.
 */
export class ProbeRecoveryPolicy implements HealthRecoveryPolicy {
  private readonly intervalMs: number;
  private readonly probeTimeoutMs: number;
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(options: ProbeRecoveryOptions) {
    this.intervalMs = Math.min(options.intervalMs, MAX_TIMEOUT_MS);
    this.probeTimeoutMs = Math.min(options.probeTimeoutMs ?? 5000, MAX_TIMEOUT_MS);
  }

  start(context: RecoveryContext): void {
    this.stop();
    this.timer = setInterval(() => {
      void this.sweep(context);
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One probe pass. Never rejects; returns the ids that were restored.
   */
  async sweep(context: RecoveryContext): Promise<string[]> {
    if (this.sweeping) return [];
    this.sweeping = true;

    const restored: string[] = [];
    try {
      const unavailable = context.registry.list().filter((model) => model.health === 'unavailable');

      for (const descriptor of unavailable) {
        const adapter = context.adapters[descriptor.backendKind];
        if (!adapter?.probe) continue;

        try {
          const alive = await adapter.probe(descriptor, AbortSignal.timeout(this.probeTimeoutMs));
          if (alive) {
            context.restore(descriptor.id);
            restored.push(descriptor.id);
            log.info({ model: descriptor.id }, 'Probe succeeded, model restored');
          }
        } catch (error) {
          log.debug({ model: descriptor.id, err: formatError(error) }, 'Probe failed, model stays unavailable');
        }
      }
    } finally {
      this.sweeping = false;
    }

    return restored;
  }
}
