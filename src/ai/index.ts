/**
 * AI Orchestration Core — Public API
 *
 * Imports from Kernel (event bus) and Utils (logging). Never reads
 * configuration or files itself; bootstrap.ts does the wiring.
 *
 * Single entry point: AIOrchestrator.query(request)
 */

// Types
export type {
  Tier,
  BackendKind,
  HealthState,
  TaskType,
  ModelMetadata,
  ModelDescriptor,
  ModelRegistration,
  ChatRole,
  ChatMessage,
  QueryInput,
  PromptContext,
  QueryParameters,
  QueryRequest,
  ChatResult,
  ClassificationResult,
  VisionResult,
  CodeAnalysisResult,
  ResultPayload,
  ResultKind,
  SelectionMode,
  QueryTiming,
  QueryResponse,
} from './types.js';
export {
  TIERS,
  MAX_TIER,
  TASK_TYPES,
  TierSchema,
  BackendKindSchema,
  HealthStateSchema,
  ModelDescriptorSchema,
  ModelRegistrationSchema,
  QueryInputSchema,
  QueryRequestSchema,
  ResultPayloadSchema,
  QueryResponseSchema,
  RESULT_KIND_BY_BACKEND,
  INPUT_SCHEMA_BY_BACKEND,
} from './types.js';

// Errors
export type { OrchestratorErrorCode, AdapterFailureReason } from './errors.js';
export {
  OrchestratorError,
  UnknownModelError,
  DuplicateModelError,
  PermissionDeniedError,
  NoAuthorizedModelError,
  BackendUnavailableError,
  SchemaValidationError,
  AdapterError,
  toAdapterError,
} from './errors.js';

// Schema layer
export { validate, validateInput, validateResult } from './schema.js';

// Tier policy
export { authorize, filterAuthorized, isValidTier, tierName } from './tier-policy.js';

// Registry + catalog
export { ModelRegistry, type ModelRegistryOptions } from './model-registry.js';
export { DEFAULT_CATALOG, registerCatalog } from './catalog.js';

// Health
export { HealthTracker, type HealthTrackerConfig } from './health-tracker.js';
export {
  ManualRecoveryPolicy,
  ProbeRecoveryPolicy,
  type HealthRecoveryPolicy,
  type RecoveryContext,
  type ProbeRecoveryOptions,
} from './recovery.js';

// Orchestrator
export {
  AIOrchestrator,
  type AIOrchestratorOptions,
  type AskOptions,
  type ListModelsFilter,
  type ModelStats,
  type OrchestratorStats,
} from './orchestrator.js';
export { describeInput, inferTaskType } from './task-inference.js';

// Adapters
export type { AdapterRequest, AdapterSet, BackendAdapter } from './adapters/types.js';
export { GeneralModelAdapter, type GeneralModelAdapterOptions } from './adapters/general-model.js';
export { VisionAdapter } from './adapters/vision.js';
export { CodeAnalysisAdapter } from './adapters/code-analysis.js';
export {
  ClassifierAdapter,
  HttpClassifierRuntime,
  ClassifierApiError,
  type ClassifierRuntime,
  type ClassifierPrediction,
} from './adapters/classifier.js';

// Wiring
export {
  createOrchestrator,
  createAdapters,
  createRecoveryPolicy,
  type Switchyard,
  type BootstrapOverrides,
} from './bootstrap.js';
