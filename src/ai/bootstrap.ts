import { OllamaClient } from '../integrations/ollama/client.js';
import { EventBus } from '../kernel/event-bus.js';
import { type Config, type Result, ok, err } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ClassifierAdapter, type ClassifierRuntime, HttpClassifierRuntime } from './adapters/classifier.js';
import { CodeAnalysisAdapter } from './adapters/code-analysis.js';
import { GeneralModelAdapter } from './adapters/general-model.js';
import type { AdapterSet } from './adapters/types.js';
import { VisionAdapter } from './adapters/vision.js';
import { DEFAULT_CATALOG, registerCatalog } from './catalog.js';
import type { OrchestratorError } from './errors.js';
import { ModelRegistry } from './model-registry.js';
import { AIOrchestrator } from './orchestrator.js';
import { type HealthRecoveryPolicy, ManualRecoveryPolicy, ProbeRecoveryPolicy } from './recovery.js';

export interface Switchyard {
  orchestrator: AIOrchestrator;
  registry: ModelRegistry;
  eventBus: EventBus;
}

export interface BootstrapOverrides {
  ollama?: OllamaClient;
  classifierRuntime?: ClassifierRuntime;
  eventBus?: EventBus;
}

/**
 * Adapters for every backend the configuration can reach. Classifiers need
 * a classifier runtime; without one, classifier models stay registered but
 * every call to them fails as unavailable.
 */
export function createAdapters(config: Config, overrides: BootstrapOverrides = {}): AdapterSet {
  const ollama = overrides.ollama ?? new OllamaClient(config.backends.ollama_url);
  const classifierRuntime =
    overrides.classifierRuntime ??
    (config.backends.classifier_url !== undefined ? new HttpClassifierRuntime(config.backends.classifier_url) : undefined);

  return {
    'general-model': new GeneralModelAdapter({ client: ollama }),
    vision: new VisionAdapter(ollama),
    'code-analysis': new CodeAnalysisAdapter(ollama),
    ...(classifierRuntime ? { classifier: new ClassifierAdapter(classifierRuntime) } : {}),
  };
}

export function createRecoveryPolicy(config: Config): HealthRecoveryPolicy {
  const { recovery } = config.orchestrator;
  return recovery.mode === 'probe'
    ? new ProbeRecoveryPolicy({ intervalMs: recovery.probe_interval_ms })
    : new ManualRecoveryPolicy();
}

/**
 * Wire a ready-to-query orchestrator from configuration: registry with the
 * configured catalog (or the default one), adapters, event bus, recovery.
 */
export function createOrchestrator(
  config: Config,
  overrides: BootstrapOverrides = {},
): Result<Switchyard, OrchestratorError> {
  const eventBus = overrides.eventBus ?? new EventBus();
  const registry = new ModelRegistry({ eventBus, tierOrder: config.orchestrator.tier_order });

  const catalog = registerCatalog(registry, config.models ?? DEFAULT_CATALOG);
  if (!catalog.success) {
    return err(catalog.error);
  }

  const orchestrator = new AIOrchestrator({
    registry,
    adapters: createAdapters(config, overrides),
    eventBus,
    failureThreshold: config.orchestrator.failure_threshold,
    defaultTimeoutMs: config.orchestrator.default_timeout_ms,
    recoveryPolicy: createRecoveryPolicy(config),
  });

  logger.info(
    { models: catalog.data.length, recovery: config.orchestrator.recovery.mode },
    'Orchestrator ready',
  );

  return ok({ orchestrator, registry, eventBus });
}
