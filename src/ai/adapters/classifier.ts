import { z } from 'zod';
import { AdapterError, toAdapterError } from '../errors.js';
import { describeInput } from '../task-inference.js';
import type { ClassificationResult, ModelDescriptor } from '../types.js';
import { inputText } from './prompting.js';
import { type AdapterRequest, type BackendAdapter, runtimeModelName } from './types.js';

// ── Runtime contract ─────────────────────────────────────────────────────────

export const ClassifierPredictionSchema = z.object({
  probabilities: z.record(z.string(), z.number().min(0).max(1)),
});
export type ClassifierPrediction = z.infer<typeof ClassifierPredictionSchema>;

/**
 * A trained classifier, treated as an opaque capability: text in,
 * per-class probabilities out. Training happens elsewhere.
 */
export interface ClassifierRuntime {
  predict(model: string, text: string, signal: AbortSignal): Promise<ClassifierPrediction>;
  isReady?(model: string, signal: AbortSignal): Promise<boolean>;
}

export class ClassifierApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly endpoint: string
  ) {
    super(`Classifier API error: ${status} (${endpoint})`);
    this.name = 'ClassifierApiError';
  }
}

/**
 * Classifier runtime reached over HTTP:
 * POST {baseUrl}/predict { model, input } → { probabilities }
 * GET  {baseUrl}/models/{model} → 200 when loaded
 */
export class HttpClassifierRuntime implements ClassifierRuntime {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async predict(model: string, text: string, signal: AbortSignal): Promise<ClassifierPrediction> {
    const response = await fetch(`${this.baseUrl}/predict`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model, input: text }),
      signal,
    });

    if (!response.ok) {
      throw new ClassifierApiError(response.status, '/predict');
    }

    const parsed = ClassifierPredictionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AdapterError('malformed_response', `classifier ${model} returned an unexpected shape`);
    }
    return parsed.data;
  }

  async isReady(model: string, signal: AbortSignal): Promise<boolean> {
    const response = await fetch(`${this.baseUrl}/models/${encodeURIComponent(model)}`, { signal });
    return response.ok;
  }
}

// ── Adapter ──────────────────────────────────────────────────────────────────

/**
 * Pick the winning class. When the caller restricts the label set the
 * remaining probabilities are renormalised to sum to one.
 */
export function summarizePrediction(
  prediction: ClassifierPrediction,
  labels?: string[],
): Omit<ClassificationResult, 'kind'> | null {
  let entries = Object.entries(prediction.probabilities);
  if (labels) {
    const allowed = new Set(labels);
    entries = entries.filter(([label]) => allowed.has(label));
    const total = entries.reduce((sum, [, p]) => sum + p, 0);
    if (total <= 0) return null;
    entries = entries.map(([label, p]): [string, number] => [label, p / total]);
  }

  if (entries.length === 0) return null;

  const ranked = [...entries].sort(([la, pa], [lb, pb]) => pb - pa || la.localeCompare(lb));
  const top = ranked[0];
  if (!top) return null;

  return {
    predictedClass: top[0],
    confidence: top[1],
    probabilities: Object.fromEntries(entries),
  };
}

export class ClassifierAdapter implements BackendAdapter {
  readonly kind = 'classifier' as const;

  constructor(private readonly runtime: ClassifierRuntime) {}

  async invoke(
    descriptor: ModelDescriptor,
    request: AdapterRequest,
    signal: AbortSignal,
  ): Promise<ClassificationResult> {
    const text = inputText(request.input);
    if (text === null) {
      throw new AdapterError('rejected', `classifier ${descriptor.id} cannot take ${describeInput(request.input)} input`);
    }

    let reply: unknown;
    try {
      reply = await this.runtime.predict(runtimeModelName(descriptor), text, signal);
    } catch (error) {
      throw toAdapterError(error, `classifier ${descriptor.id}`);
    }

    // Injected runtimes are not bound by the HTTP runtime's own check
    const prediction = ClassifierPredictionSchema.safeParse(reply);
    if (!prediction.success) {
      throw new AdapterError('malformed_response', `classifier ${descriptor.id} returned an unexpected shape`);
    }

    const summary = summarizePrediction(prediction.data, request.parameters.labels);
    if (!summary) {
      throw new AdapterError('malformed_response', `classifier ${descriptor.id} returned no usable probabilities`);
    }

    return { kind: 'classification', ...summary };
  }

  async probe(descriptor: ModelDescriptor, signal: AbortSignal): Promise<boolean> {
    if (!this.runtime.isReady) return false;
    return this.runtime.isReady(runtimeModelName(descriptor), signal);
  }
}
