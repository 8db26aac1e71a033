import { z } from 'zod';
import type { HealthState } from './types.js';

export const HealthTrackerConfigSchema = z.object({
  /** Consecutive transient failures before a model is taken out of rotation */
  failureThreshold: z.number().int().positive().default(3),
});
export type HealthTrackerConfig = z.infer<typeof HealthTrackerConfigSchema>;

/**
 * Consecutive-failure tracker for backend health.
 *
 * A per-model breaker that only counts; the registry owns the resulting state.
 *
 * - healthy → degraded: first transient failure
 * - degraded → unavailable: failureThreshold consecutive transient failures
 * - degraded → healthy: any success
 * - unavailable → healthy: external recovery signal only (see recovery.ts)
 *
 * The count restarts whenever the model is healthy at the time of a failure,
 * so a model restored by an operator gets the full threshold again.
 */
export class HealthTracker {
  private readonly consecutiveFailures: Map<string, number> = new Map();
  private readonly config: HealthTrackerConfig;

  constructor(config?: Partial<HealthTrackerConfig>) {
    this.config = HealthTrackerConfigSchema.parse(config ?? {});
  }

  get failureThreshold(): number {
    return this.config.failureThreshold;
  }

  /**
   * Record a transient failure and return the health state the model should move to.
   */
  recordFailure(modelId: string, currentHealth: HealthState): HealthState {
    const previous = currentHealth === 'healthy' ? 0 : (this.consecutiveFailures.get(modelId) ?? 0);
    const failures = previous + 1;
    this.consecutiveFailures.set(modelId, failures);

    return failures >= this.config.failureThreshold ? 'unavailable' : 'degraded';
  }

  /**
   * Record a success and return the health state the model should move to.
   */
  recordSuccess(modelId: string, currentHealth: HealthState): HealthState {
    this.consecutiveFailures.delete(modelId);
    return currentHealth === 'degraded' ? 'healthy' : currentHealth;
  }

  getFailureCount(modelId: string): number {
    return this.consecutiveFailures.get(modelId) ?? 0;
  }

  reset(modelId?: string): void {
    if (modelId === undefined) {
      this.consecutiveFailures.clear();
      return;
    }
    this.consecutiveFailures.delete(modelId);
  }
}
