import type { BackendKind, HealthState, SelectionMode, Tier } from '../ai/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('switchyard:event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Registry and orchestrator publish here; dashboards and audit sinks subscribe.
 */
export interface EventMap {
  // ── Registry events ────────────────────────────────────────────────────
  'model:registered': { modelId: string; backendKind: BackendKind; requiredTier: Tier; sequence: number };
  'model:deregistered': { modelId: string };
  'model:health_changed': { modelId: string; previous: HealthState; current: HealthState; timestamp: Date };

  // ── Orchestrator events ────────────────────────────────────────────────
  'query:completed': { modelId: string; selection: SelectionMode; durationMs: number; attempts: number };
  'query:failed': { code: string; modelId?: string; selection: SelectionMode; durationMs: number };
  'query:fallback': { failedModelId: string; reason: string; taskType: string };

  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

/**
 * Typed pub/sub with handler isolation: one throwing subscriber never
 * prevents delivery to the others.
 */
export class EventBus {
  private listeners: Map<string, Set<(payload: never) => void>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as (payload: EventMap[K]) => void)(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event: String(event), err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event: String(event),
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  /**
   * Subscribe to an event for a single occurrence
   */
  once<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    const handlers = this.listeners.get(event);
    return handlers ? handlers.size : 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
