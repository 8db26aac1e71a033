import { type Result, ok, err } from '../types/index.js';
import type { OrchestratorError } from './errors.js';
import type { ModelRegistry } from './model-registry.js';
import { validate } from './schema.js';
import {
  type ModelDescriptor,
  type ModelRegistration,
  ModelRegistrationSchema,
  TASK_TYPES,
  TIERS,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT MODEL CATALOG
// ═══════════════════════════════════════════════════════════════════════════════

const { CHAT, GENERATE, ANALYZE, CLASSIFY, PREDICT, VISION, CODE_ANALYSIS } = TASK_TYPES;

/**
 * Models a fresh deployment routes to when configuration lists none.
 * General models on a local Ollama runtime, trained classifiers behind the
 * classifier runtime.
 */
export const DEFAULT_CATALOG: readonly ModelRegistration[] = [
  // ── General models ─────────────────────────────────────────────────────
  {
    id: 'llama2',
    backendKind: 'general-model',
    requiredTier: TIERS.BASIC,
    capabilities: [CHAT, ANALYZE, GENERATE],
    description: 'General conversation and analysis',
    metadata: { contextWindow: 4096 },
  },
  {
    id: 'mistral',
    backendKind: 'general-model',
    requiredTier: TIERS.BASIC,
    capabilities: [CHAT, ANALYZE, GENERATE],
    description: 'Fast general model',
    metadata: { contextWindow: 8192 },
  },
  {
    id: 'phi',
    backendKind: 'general-model',
    requiredTier: TIERS.BASIC,
    capabilities: [CHAT, GENERATE],
    description: 'Small model for short answers',
    metadata: { contextWindow: 2048 },
  },
  {
    id: 'codellama',
    backendKind: 'code-analysis',
    requiredTier: TIERS.BASIC,
    capabilities: [CODE_ANALYSIS],
    description: 'Code review and quality scoring',
    metadata: { contextWindow: 16384 },
  },

  // ── Neural classifiers ─────────────────────────────────────────────────
  {
    id: 'technical-classifier',
    backendKind: 'classifier',
    requiredTier: TIERS.NEURAL,
    capabilities: [CLASSIFY, PREDICT],
    description: 'Technical vs non-technical content',
    metadata: { accuracy: 0.91 },
  },
  {
    id: 'privacy-classifier',
    backendKind: 'classifier',
    requiredTier: TIERS.NEURAL,
    capabilities: [CLASSIFY, PREDICT],
    description: 'Flags content that exposes personal data',
    metadata: { accuracy: 0.88 },
  },
  {
    id: 'validation-classifier',
    backendKind: 'classifier',
    requiredTier: TIERS.NEURAL,
    capabilities: [CLASSIFY, PREDICT],
    description: 'Valid vs invalid submissions',
    metadata: { accuracy: 0.86 },
  },
  {
    id: 'quality-judge',
    backendKind: 'classifier',
    requiredTier: TIERS.NEURAL,
    capabilities: [CLASSIFY, PREDICT],
    description: 'Scores feedback as useful or not',
    metadata: { accuracy: 0.83 },
  },
  {
    id: 'color-classifier',
    backendKind: 'classifier',
    requiredTier: TIERS.NEURAL,
    capabilities: [CLASSIFY],
    description: 'Colour names from descriptions',
  },
  {
    id: 'parity-classifier',
    backendKind: 'classifier',
    requiredTier: TIERS.NEURAL,
    capabilities: [CLASSIFY],
    description: 'Even or odd; runtime smoke test',
  },

  // ── Vision ─────────────────────────────────────────────────────────────
  {
    id: 'llava',
    backendKind: 'vision',
    requiredTier: TIERS.VISION,
    capabilities: [VISION],
    description: 'Image description and labelling',
  },
];

/**
 * Register a batch of entries. All or nothing: on the first bad or duplicate
 * entry the ones already added by this call are removed again.
 */
export function registerCatalog(
  registry: ModelRegistry,
  entries: readonly unknown[],
): Result<ModelDescriptor[], OrchestratorError> {
  const registered: ModelDescriptor[] = [];

  for (const [index, entry] of entries.entries()) {
    const parsed = validate(entry, ModelRegistrationSchema, `catalog entry ${index}`);
    const result = parsed.success ? registry.register(parsed.data) : parsed;

    if (!result.success) {
      for (const descriptor of registered) {
        registry.deregister(descriptor.id);
      }
      return err(result.error);
    }
    registered.push(result.data);
  }

  return ok(registered);
}
