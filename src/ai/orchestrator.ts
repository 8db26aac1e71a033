import type { EventBus } from '../kernel/event-bus.js';
import { MAX_TIMEOUT_MS, type Result, ok, err } from '../types/index.js';
import { orchestratorLogger as log, formatError } from '../utils/logger.js';
import type { AdapterRequest, AdapterSet } from './adapters/types.js';
import {
  AdapterError,
  BackendUnavailableError,
  NoAuthorizedModelError,
  type OrchestratorError,
  PermissionDeniedError,
  SchemaValidationError,
  toAdapterError,
} from './errors.js';
import { HealthTracker } from './health-tracker.js';
import type { ModelRegistry } from './model-registry.js';
import { type HealthRecoveryPolicy, ManualRecoveryPolicy } from './recovery.js';
import { validate, validateInput, validateResult } from './schema.js';
import { inferTaskType } from './task-inference.js';
import { authorize } from './tier-policy.js';
import {
  type ModelDescriptor,
  type QueryInput,
  type QueryRequest,
  QueryRequestSchema,
  type QueryResponse,
  QueryResponseSchema,
  type ResultPayload,
  type SelectionMode,
  type TaskType,
  type Tier,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// AI ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════
//
// Single entry point for every model call:
//
//   request ─▶ validate ─▶ select (explicit | auto) ─▶ authorize
//           ─▶ dispatch (adapter + timeout) ─▶ validate result ─▶ response
//
// Transient backend failures feed the health tracker. Auto-selected calls get
// one retry on the next candidate; explicit calls never substitute.
//
// ═══════════════════════════════════════════════════════════════════════════════

export interface AIOrchestratorOptions {
  registry: ModelRegistry;
  adapters: AdapterSet;
  eventBus?: EventBus;
  /** Consecutive transient failures before a model becomes unavailable (default 3) */
  failureThreshold?: number;
  /** Per-call budget when the request names none (default 30000) */
  defaultTimeoutMs?: number;
  /** Who brings unavailable models back (default: operator only) */
  recoveryPolicy?: HealthRecoveryPolicy;
}

export type AskOptions = Omit<QueryRequest, 'input' | 'callerTier'>;

export interface ListModelsFilter {
  /** Only models a caller of this tier may use */
  tier?: number;
  capability?: TaskType;
}

export interface ModelStats {
  successes: number;
  failures: number;
}

export interface OrchestratorStats {
  totalQueries: number;
  successful: number;
  failed: number;
  fallbacks: number;
  /** Percent, 0 when nothing has run yet */
  successRate: number;
  byModel: Record<string, ModelStats>;
  modelsRegistered: number;
}

interface Dispatched {
  descriptor: ModelDescriptor;
  result: ResultPayload;
  attempts: number;
  fallbackFrom?: string;
}

type DispatchFailure = AdapterError | SchemaValidationError;

const DEFAULT_TIMEOUT_MS = 30_000;

export class AIOrchestrator {
  private readonly registry: ModelRegistry;
  private readonly adapters: AdapterSet;
  private readonly eventBus?: EventBus;
  private readonly health: HealthTracker;
  private readonly defaultTimeoutMs: number;
  private readonly recoveryPolicy: HealthRecoveryPolicy;

  private totalQueries = 0;
  private successful = 0;
  private failed = 0;
  private fallbacks = 0;
  private readonly byModel: Map<string, ModelStats> = new Map();
  private readonly unsubscribe?: () => void;

  constructor(options: AIOrchestratorOptions) {
    this.registry = options.registry;
    this.adapters = options.adapters;
    this.eventBus = options.eventBus;
    this.health = new HealthTracker({ failureThreshold: options.failureThreshold });
    this.defaultTimeoutMs = Math.min(options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS);
    this.recoveryPolicy = options.recoveryPolicy ?? new ManualRecoveryPolicy();

    // Stats and failure streaks live only as long as the registration
    this.unsubscribe = this.eventBus?.on('model:deregistered', ({ modelId }) => {
      this.byModel.delete(modelId);
      this.health.reset(modelId);
    });

    this.recoveryPolicy.start({
      registry: this.registry,
      adapters: this.adapters,
      restore: (modelId) => {
        this.restoreHealth(modelId);
      },
    });
  }

  // ── Public API ─────────────────────────────────────────────────────────────

  async query(request: QueryRequest): Promise<Result<QueryResponse, OrchestratorError>> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    this.totalQueries++;

    const parsed = validate(request, QueryRequestSchema, 'query request');
    if (!parsed.success) {
      return this.fail(parsed.error, 'auto', started);
    }

    const req = parsed.data;
    const selection: SelectionMode = req.modelId !== undefined ? 'explicit' : 'auto';
    const outcome =
      req.modelId !== undefined ? await this.runExplicit(req, req.modelId) : await this.runAuto(req);

    if (!outcome.success) {
      return this.fail(outcome.error, selection, started);
    }

    const { descriptor, result, attempts, fallbackFrom } = outcome.data;
    const durationMs = Date.now() - started;

    const response = validate(
      {
        modelId: descriptor.id,
        backendKind: descriptor.backendKind,
        result,
        ...(result.kind === 'classification' ? { confidence: result.confidence } : {}),
        selection,
        ...(fallbackFrom !== undefined ? { fallbackFrom } : {}),
        timing: { startedAt, completedAt: new Date().toISOString(), durationMs, attempts },
      },
      QueryResponseSchema,
      'query response',
    );
    if (!response.success) {
      return this.fail(response.error, selection, started, descriptor.id);
    }

    this.successful++;
    log.info({ model: descriptor.id, selection, durationMs, attempts }, 'Query completed');
    this.eventBus?.emit('query:completed', { modelId: descriptor.id, selection, durationMs, attempts });

    return ok(response.data);
  }

  /**
   * Shorthand for query(): input and tier positional, the rest optional.
   */
  ask(input: QueryInput, callerTier: Tier, options: AskOptions = {}): Promise<Result<QueryResponse, OrchestratorError>> {
    return this.query({ ...options, input, callerTier });
  }

  listModels(filter: ListModelsFilter = {}): ModelDescriptor[] {
    const models =
      filter.capability !== undefined ? this.registry.listByCapability(filter.capability) : this.registry.list();
    const { tier } = filter;
    return tier === undefined ? models : models.filter((model) => authorize(tier, model));
  }

  getStats(): OrchestratorStats {
    const byModel: Record<string, ModelStats> = {};
    for (const [id, stats] of this.byModel) {
      if (!this.registry.has(id)) {
        this.byModel.delete(id);
        continue;
      }
      byModel[id] = { ...stats };
    }

    return {
      totalQueries: this.totalQueries,
      successful: this.successful,
      failed: this.failed,
      fallbacks: this.fallbacks,
      successRate: this.totalQueries > 0 ? (this.successful / this.totalQueries) * 100 : 0,
      byModel,
      modelsRegistered: this.registry.size,
    };
  }

  /**
   * Operator recovery: mark a model healthy and forget its failure streak.
   */
  restoreHealth(modelId: string): Result<ModelDescriptor, OrchestratorError> {
    this.health.reset(modelId);
    return this.registry.setHealth(modelId, 'healthy');
  }

  close(): void {
    this.unsubscribe?.();
    this.recoveryPolicy.stop();
  }

  // ── Selection ──────────────────────────────────────────────────────────────

  private async runExplicit(req: QueryRequest, modelId: string): Promise<Result<Dispatched, OrchestratorError>> {
    const found = this.registry.lookup(modelId);
    if (!found.success) {
      return err(found.error);
    }

    const descriptor = found.data;
    if (!authorize(req.callerTier, descriptor)) {
      return err(new PermissionDeniedError(descriptor.id, descriptor.requiredTier, req.callerTier));
    }

    if (descriptor.health === 'unavailable') {
      return err(new BackendUnavailableError(descriptor.id, 'marked unavailable'));
    }

    const fits = validateInput(descriptor.backendKind, req.input);
    if (!fits.success) {
      return err(fits.error);
    }

    const taskType = req.taskType ?? inferTaskType(req.input);
    const attempt = await this.dispatch(descriptor, req, taskType);
    if (!attempt.success) {
      return err(this.toCallerError(descriptor, attempt.error));
    }

    return ok({ descriptor, result: attempt.data, attempts: 1 });
  }

  private async runAuto(req: QueryRequest): Promise<Result<Dispatched, OrchestratorError>> {
    const taskType = req.taskType ?? inferTaskType(req.input);

    const first = this.select(taskType, req.callerTier, new Set());
    if (!first) {
      return err(new NoAuthorizedModelError(taskType, req.callerTier));
    }

    const fits = validateInput(first.backendKind, req.input);
    if (!fits.success) {
      return err(fits.error);
    }

    const attempt = await this.dispatch(first, req, taskType);
    if (attempt.success) {
      return ok({ descriptor: first, result: attempt.data, attempts: 1 });
    }

    const failure = attempt.error;
    if (!(failure instanceof AdapterError) || !failure.transient) {
      return err(this.toCallerError(first, failure));
    }

    const second = this.select(taskType, req.callerTier, new Set([first.id]), req.input);
    if (!second) {
      return err(new BackendUnavailableError(first.id, `${failure.message}; no other candidate`, failure));
    }

    this.fallbacks++;
    log.warn({ failed: first.id, next: second.id, reason: failure.reason, taskType }, 'Falling back to next candidate');
    this.eventBus?.emit('query:fallback', { failedModelId: first.id, reason: failure.reason, taskType });

    const retry = await this.dispatch(second, req, taskType);
    if (!retry.success) {
      return err(this.toCallerError(second, retry.error));
    }

    return ok({ descriptor: second, result: retry.data, attempts: 2, fallbackFrom: first.id });
  }

  /**
   * Best candidate for a task: registry order, minus what the caller may not
   * use, minus unavailable models, minus ids already tried. With an input,
   * also minus models whose backend kind cannot take it.
   */
  private select(
    taskType: TaskType,
    callerTier: Tier,
    exclude: ReadonlySet<string>,
    input?: QueryInput,
  ): ModelDescriptor | undefined {
    return this.registry
      .listByCapability(taskType)
      .find(
        (model) =>
          !exclude.has(model.id) &&
          model.health !== 'unavailable' &&
          authorize(callerTier, model) &&
          (input === undefined || validateInput(model.backendKind, input).success),
      );
  }

  // ── Dispatch ───────────────────────────────────────────────────────────────

  private async dispatch(
    descriptor: ModelDescriptor,
    req: QueryRequest,
    taskType: TaskType,
  ): Promise<Result<ResultPayload, DispatchFailure>> {
    const adapter = this.adapters[descriptor.backendKind];
    if (!adapter) {
      const missing = new AdapterError('failed', `no adapter configured for backend kind ${descriptor.backendKind}`);
      this.recordOutcome(descriptor.id, false);
      return err(missing);
    }

    const timeoutMs = req.timeoutMs ?? this.defaultTimeoutMs;
    const adapterRequest: AdapterRequest = { input: req.input, taskType, parameters: req.parameters ?? {} };
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    let payload: ResultPayload;
    try {
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          controller.abort();
          reject(new AdapterError('timeout', `${descriptor.id} did not answer within ${timeoutMs}ms`));
        }, timeoutMs);
      });
      payload = await Promise.race([adapter.invoke(descriptor, adapterRequest, controller.signal), deadline]);
    } catch (error) {
      const failure = toAdapterError(error, `${descriptor.backendKind} ${descriptor.id}`);
      this.recordOutcome(descriptor.id, false);
      if (failure.transient) {
        this.markFailure(descriptor.id);
      }
      log.warn({ model: descriptor.id, reason: failure.reason, err: formatError(failure) }, 'Backend call failed');
      return err(failure);
    } finally {
      clearTimeout(timer);
    }

    const checked = validateResult(descriptor.backendKind, payload);
    if (!checked.success) {
      this.recordOutcome(descriptor.id, false);
      log.warn({ model: descriptor.id, issues: checked.error.issues }, 'Backend result failed validation');
      return err(checked.error);
    }

    this.recordOutcome(descriptor.id, true);
    this.markSuccess(descriptor.id);
    return ok(checked.data);
  }

  // ── Health ─────────────────────────────────────────────────────────────────

  /** Health is read fresh from the registry; the model may have changed or gone since dispatch. */
  private markFailure(modelId: string): void {
    const current = this.registry.lookup(modelId);
    if (!current.success) return;
    const next = this.health.recordFailure(modelId, current.data.health);
    this.registry.setHealth(modelId, next);
  }

  private markSuccess(modelId: string): void {
    const current = this.registry.lookup(modelId);
    if (!current.success) return;
    const next = this.health.recordSuccess(modelId, current.data.health);
    this.registry.setHealth(modelId, next);
  }

  // ── Outcomes ───────────────────────────────────────────────────────────────

  private toCallerError(descriptor: ModelDescriptor, failure: DispatchFailure): OrchestratorError {
    if (failure instanceof SchemaValidationError) return failure;
    if (failure.reason === 'malformed_response') {
      return new SchemaValidationError(`${descriptor.backendKind} result`, [failure.message]);
    }
    return new BackendUnavailableError(descriptor.id, failure.message, failure);
  }

  private recordOutcome(modelId: string, success: boolean): void {
    const stats = this.byModel.get(modelId) ?? { successes: 0, failures: 0 };
    if (success) {
      stats.successes++;
    } else {
      stats.failures++;
    }
    this.byModel.set(modelId, stats);
  }

  private fail(
    error: OrchestratorError,
    selection: SelectionMode,
    started: number,
    modelId?: string,
  ): Result<never, OrchestratorError> {
    this.failed++;
    const durationMs = Date.now() - started;
    const failedModel = modelId ?? modelIdOf(error);

    log.warn({ code: error.code, model: failedModel, selection, durationMs, err: formatError(error) }, 'Query failed');
    this.eventBus?.emit('query:failed', {
      code: error.code,
      ...(failedModel !== undefined ? { modelId: failedModel } : {}),
      selection,
      durationMs,
    });

    return err(error);
  }
}

function modelIdOf(error: OrchestratorError): string | undefined {
  const value: unknown = Reflect.get(error, 'modelId');
  return typeof value === 'string' ? value : undefined;
}
