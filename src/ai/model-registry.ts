import type { EventBus } from '../kernel/event-bus.js';
import { type Result, type TierOrder, ok, err } from '../types/index.js';
import { registryLogger as log } from '../utils/logger.js';
import {
  DuplicateModelError,
  SchemaValidationError,
  UnknownModelError,
} from './errors.js';
import { validate } from './schema.js';
import {
  type HealthState,
  type ModelDescriptor,
  type ModelRegistration,
  ModelRegistrationSchema,
  type TaskType,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MODEL REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * ModelRegistry — the closed-world catalog of models this deployment can route to.
 *
 * Reads never take a lock. Every write builds a new frozen snapshot and swaps
 * it in with a single assignment, so a reader holding a snapshot keeps a
 * consistent view while writes land, and a descriptor it was handed never
 * changes under it.
 *
 * Required tier is fixed at registration. There is no update
 * operation: changing it means deregister + register.
 */

export interface ModelRegistryOptions {
  eventBus?: EventBus;
  /** How required tier breaks ties after health. Default 'ascending'. */
  tierOrder?: TierOrder;
}

interface RegistryEntry {
  readonly descriptor: Readonly<ModelDescriptor>;
  readonly sequence: number;
}

interface RegistrySnapshot {
  readonly entries: ReadonlyMap<string, RegistryEntry>;
}

const HEALTH_RANK: Record<HealthState, number> = {
  healthy: 0,
  degraded: 1,
  unavailable: 2,
};

/** Deep copy, then freeze, so no caller can reach into the registry's copy. */
function freezeDescriptor(descriptor: ModelDescriptor): Readonly<ModelDescriptor> {
  const capabilities = [...descriptor.capabilities];
  Object.freeze(capabilities);
  const copy: ModelDescriptor = { ...descriptor, capabilities };
  if (descriptor.metadata) {
    copy.metadata = Object.freeze({ ...descriptor.metadata });
  }
  return Object.freeze(copy);
}

export class ModelRegistry {
  private snapshot: RegistrySnapshot = { entries: new Map() };
  private nextSequence = 0;
  private readonly eventBus?: EventBus;
  private readonly tierOrder: TierOrder;

  constructor(options: ModelRegistryOptions = {}) {
    this.eventBus = options.eventBus;
    this.tierOrder = options.tierOrder ?? 'ascending';
  }

  get size(): number {
    return this.snapshot.entries.size;
  }

  has(id: string): boolean {
    return this.snapshot.entries.has(id);
  }

  register(
    registration: ModelRegistration,
  ): Result<ModelDescriptor, DuplicateModelError | SchemaValidationError> {
    const parsed = validate(registration, ModelRegistrationSchema, 'model descriptor');
    if (!parsed.success) {
      return err(parsed.error);
    }

    const descriptor = freezeDescriptor(parsed.data);
    const current = this.snapshot;
    if (current.entries.has(descriptor.id)) {
      return err(new DuplicateModelError(descriptor.id));
    }

    const sequence = this.nextSequence++;
    const entries = new Map(current.entries);
    entries.set(descriptor.id, { descriptor, sequence });
    this.swap(entries);

    log.info(
      { model: descriptor.id, backendKind: descriptor.backendKind, requiredTier: descriptor.requiredTier },
      'Model registered',
    );
    this.eventBus?.emit('model:registered', {
      modelId: descriptor.id,
      backendKind: descriptor.backendKind,
      requiredTier: descriptor.requiredTier,
      sequence,
    });

    return ok(descriptor);
  }

  /**
   * Remove a model. Calls already dispatched keep the descriptor they captured.
   */
  deregister(id: string): Result<ModelDescriptor, UnknownModelError> {
    const current = this.snapshot;
    const entry = current.entries.get(id);
    if (!entry) {
      return err(new UnknownModelError(id));
    }

    const entries = new Map(current.entries);
    entries.delete(id);
    this.swap(entries);

    log.info({ model: id }, 'Model deregistered');
    this.eventBus?.emit('model:deregistered', { modelId: id });

    return ok(entry.descriptor);
  }

  lookup(id: string): Result<ModelDescriptor, UnknownModelError> {
    const entry = this.snapshot.entries.get(id);
    return entry ? ok(entry.descriptor) : err(new UnknownModelError(id));
  }

  /**
   * Models declaring the task type, best first: healthy before degraded before
   * unavailable, then required tier in the configured order, then registration order.
   */
  listByCapability(taskType: TaskType): ModelDescriptor[] {
    const matching = [...this.snapshot.entries.values()].filter((entry) =>
      entry.descriptor.capabilities.includes(taskType),
    );
    return matching.sort((a, b) => this.compare(a, b)).map((entry) => entry.descriptor);
  }

  /** Every model in registration order. */
  list(): ModelDescriptor[] {
    return [...this.snapshot.entries.values()]
      .sort((a, b) => a.sequence - b.sequence)
      .map((entry) => entry.descriptor);
  }

  /**
   * Record a model's health. Idempotent; subscribers hear only real transitions.
   */
  setHealth(id: string, state: HealthState): Result<ModelDescriptor, UnknownModelError> {
    const current = this.snapshot;
    const entry = current.entries.get(id);
    if (!entry) {
      return err(new UnknownModelError(id));
    }

    const previous = entry.descriptor.health;
    if (previous === state) {
      return ok(entry.descriptor);
    }

    const descriptor = freezeDescriptor({ ...entry.descriptor, health: state });
    const entries = new Map(current.entries);
    entries.set(id, { descriptor, sequence: entry.sequence });
    this.swap(entries);

    const level = state === 'healthy' ? 'info' : 'warn';
    log[level]({ model: id, previous, current: state }, 'Model health changed');
    this.eventBus?.emit('model:health_changed', {
      modelId: id,
      previous,
      current: state,
      timestamp: new Date(),
    });

    return ok(descriptor);
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private swap(entries: Map<string, RegistryEntry>): void {
    this.snapshot = { entries };
  }

  private compare(a: RegistryEntry, b: RegistryEntry): number {
    const byHealth = HEALTH_RANK[a.descriptor.health] - HEALTH_RANK[b.descriptor.health];
    if (byHealth !== 0) return byHealth;

    const byTier = a.descriptor.requiredTier - b.descriptor.requiredTier;
    if (byTier !== 0) return this.tierOrder === 'ascending' ? byTier : -byTier;

    return a.sequence - b.sequence;
  }
}
