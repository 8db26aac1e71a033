/**
 * AI Orchestration Layer — Canonical Shapes
 *
 * Every value that crosses the orchestrator boundary is described here once.
 * Adapters produce these shapes; callers consume them. Nothing in this file
 * knows about a particular model runtime.
 */

import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TIERS
// ═══════════════════════════════════════════════════════════════════════════════

export const TIERS = {
  GUEST: 0,
  BASIC: 1,
  NEURAL: 2,
  VISION: 3,
  ADMIN: 4,
} as const;

export const MAX_TIER = TIERS.ADMIN;

export const TierSchema = z.number().int().min(0).max(MAX_TIER);
export type Tier = z.infer<typeof TierSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// MODEL CATALOG
// ═══════════════════════════════════════════════════════════════════════════════

export const BackendKindSchema = z.enum(['general-model', 'classifier', 'vision', 'code-analysis']);
export type BackendKind = z.infer<typeof BackendKindSchema>;

export const HealthStateSchema = z.enum(['healthy', 'degraded', 'unavailable']);
export type HealthState = z.infer<typeof HealthStateSchema>;

/** Open set of tags; these are the ones the built-in catalog and inference use. */
export const TASK_TYPES = {
  CHAT: 'chat',
  GENERATE: 'generate',
  ANALYZE: 'analyze',
  CLASSIFY: 'classify',
  PREDICT: 'predict',
  VISION: 'vision',
  CODE_ANALYSIS: 'code-analysis',
} as const;

export const TaskTypeSchema = z.string().min(1).max(64);
export type TaskType = z.infer<typeof TaskTypeSchema>;

export const ModelMetadataSchema = z.object({
  contextWindow: z.number().int().positive().optional(),
  accuracy: z.number().min(0).max(1).optional(),
  /** Name of the model at the backend when it differs from the registry id */
  runtimeModel: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
});
export type ModelMetadata = z.infer<typeof ModelMetadataSchema>;

export const ModelDescriptorSchema = z.object({
  id: z.string().min(1).max(128),
  backendKind: BackendKindSchema,
  requiredTier: TierSchema,
  capabilities: z
    .array(TaskTypeSchema)
    .min(1)
    .refine((caps) => new Set(caps).size === caps.length, 'capabilities must be unique'),
  health: HealthStateSchema,
  description: z.string().optional(),
  metadata: ModelMetadataSchema.optional(),
});
export type ModelDescriptor = z.infer<typeof ModelDescriptorSchema>;

/** What a deployment supplies at registration time; health starts out healthy. */
export const ModelRegistrationSchema = ModelDescriptorSchema.extend({
  health: HealthStateSchema.default('healthy'),
});
export type ModelRegistration = z.input<typeof ModelRegistrationSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════════════════════

export const ChatRoleSchema = z.enum(['system', 'user', 'assistant']);
export type ChatRole = z.infer<typeof ChatRoleSchema>;

export const ChatMessageSchema = z.object({
  role: ChatRoleSchema,
  content: z.string(),
});
export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const ConversationInputSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1),
});

export const ImageInputSchema = z.object({
  /** Base64-encoded image bytes */
  image: z.string().min(1),
  prompt: z.string().optional(),
});

export const CodeInputSchema = z.object({
  code: z.string().min(1),
  language: z.string().optional(),
  path: z.string().optional(),
});

export const TextInputSchema = z.object({
  text: z.string().min(1),
});

export const QueryInputSchema = z.union([
  z.string().min(1),
  ConversationInputSchema.strict(),
  ImageInputSchema.strict(),
  CodeInputSchema.strict(),
  TextInputSchema.strict(),
]);
export type QueryInput = z.infer<typeof QueryInputSchema>;

export const PromptContextSchema = z.object({
  title: z.string().optional(),
  content: z.string(),
});
export type PromptContext = z.infer<typeof PromptContextSchema>;

export const QueryParametersSchema = z
  .object({
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().positive(),
    system: z.string(),
    context: PromptContextSchema,
    labels: z.array(z.string().min(1)).min(1),
  })
  .partial()
  .strict();
export type QueryParameters = z.infer<typeof QueryParametersSchema>;

export const QueryRequestSchema = z.object({
  input: QueryInputSchema,
  callerTier: TierSchema,
  modelId: z.string().min(1).optional(),
  taskType: TaskTypeSchema.optional(),
  parameters: QueryParametersSchema.optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});
export type QueryRequest = z.infer<typeof QueryRequestSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const ChatResultSchema = z.object({
  kind: z.literal('chat'),
  message: ChatMessageSchema,
});
export type ChatResult = z.infer<typeof ChatResultSchema>;

export const ClassificationResultSchema = z.object({
  kind: z.literal('classification'),
  predictedClass: z.string().min(1),
  confidence: z.number().min(0).max(1),
  probabilities: z.record(z.string(), z.number().min(0).max(1)),
});
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

export const VisionResultSchema = z.object({
  kind: z.literal('vision'),
  description: z.string(),
  labels: z.array(z.string()),
  text: z.string().optional(),
});
export type VisionResult = z.infer<typeof VisionResultSchema>;

export const CodeAnalysisResultSchema = z.object({
  kind: z.literal('code-analysis'),
  issues: z.array(z.string()),
  suggestions: z.array(z.string()),
  qualityScore: z.number().min(0).max(100),
  complexity: z.enum(['low', 'medium', 'high']),
});
export type CodeAnalysisResult = z.infer<typeof CodeAnalysisResultSchema>;

export const ResultPayloadSchema = z.discriminatedUnion('kind', [
  ChatResultSchema,
  ClassificationResultSchema,
  VisionResultSchema,
  CodeAnalysisResultSchema,
]);
export type ResultPayload = z.infer<typeof ResultPayloadSchema>;
export type ResultKind = ResultPayload['kind'];

export const RESULT_KIND_BY_BACKEND = {
  'general-model': 'chat',
  classifier: 'classification',
  vision: 'vision',
  'code-analysis': 'code-analysis',
} as const satisfies Record<BackendKind, ResultKind>;

/** Result shape each backend kind is allowed to produce. */
export const RESULT_SCHEMA_BY_BACKEND = {
  'general-model': ChatResultSchema,
  classifier: ClassificationResultSchema,
  vision: VisionResultSchema,
  'code-analysis': CodeAnalysisResultSchema,
} as const satisfies Record<BackendKind, z.ZodTypeAny>;

/** Input shapes each backend kind can take. */
export const INPUT_SCHEMA_BY_BACKEND = {
  'general-model': z.union([
    z.string().min(1),
    ConversationInputSchema.strict(),
    TextInputSchema.strict(),
    CodeInputSchema.strict(),
  ]),
  classifier: z.union([
    z.string().min(1),
    ConversationInputSchema.strict().refine((input) => input.messages.some((message) => message.role === 'user'), {
      message: 'a conversation to classify needs a user turn',
    }),
    TextInputSchema.strict(),
    CodeInputSchema.strict(),
  ]),
  vision: ImageInputSchema.strict(),
  'code-analysis': z.union([z.string().min(1), CodeInputSchema.strict()]),
} as const satisfies Record<BackendKind, z.ZodTypeAny>;

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

export const SelectionModeSchema = z.enum(['explicit', 'auto']);
export type SelectionMode = z.infer<typeof SelectionModeSchema>;

export const QueryTimingSchema = z.object({
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
  durationMs: z.number().nonnegative(),
  attempts: z.number().int().positive(),
});
export type QueryTiming = z.infer<typeof QueryTimingSchema>;

export const QueryResponseSchema = z
  .object({
    modelId: z.string().min(1),
    backendKind: BackendKindSchema,
    result: ResultPayloadSchema,
    confidence: z.number().min(0).max(1).optional(),
    selection: SelectionModeSchema,
    /** Model that failed before this one answered, when auto-selection fell back */
    fallbackFrom: z.string().optional(),
    timing: QueryTimingSchema,
  })
  .refine((response) => response.result.kind === RESULT_KIND_BY_BACKEND[response.backendKind], {
    message: 'result kind does not match the backend kind that produced it',
    path: ['result', 'kind'],
  });
export type QueryResponse = z.infer<typeof QueryResponseSchema>;
