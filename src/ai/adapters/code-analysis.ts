import { z } from 'zod';
import type { OllamaClient } from '../../integrations/ollama/client.js';
import { AdapterError, toAdapterError } from '../errors.js';
import { describeInput } from '../task-inference.js';
import type { CodeAnalysisResult, ModelDescriptor } from '../types.js';
import { hasOllamaModel } from './general-model.js';
import { fenced, parseJsonReply } from './prompting.js';
import { type AdapterRequest, type BackendAdapter, runtimeModelName } from './types.js';

const CodeReviewReplySchema = z.object({
  issues: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
  qualityScore: z.number().min(0).max(100),
  complexity: z.enum(['low', 'medium', 'high']),
});

const SYSTEM_PROMPT =
  'You are a meticulous code reviewer. Reply with a single JSON object: ' +
  '{"issues": string[], "suggestions": string[], "qualityScore": number from 0 to 100, ' +
  '"complexity": "low" | "medium" | "high"}. No prose outside the JSON.';

/**
 * Code review models. Same Ollama runtime as general models, but the prompt
 * and reply are constrained to the code-analysis shape.
 */
export class CodeAnalysisAdapter implements BackendAdapter {
  readonly kind = 'code-analysis' as const;

  constructor(private readonly client: OllamaClient) {}

  async invoke(
    descriptor: ModelDescriptor,
    request: AdapterRequest,
    signal: AbortSignal,
  ): Promise<CodeAnalysisResult> {
    const { input, parameters } = request;

    let prompt: string;
    if (typeof input === 'string') {
      prompt = `Review this code:\n\n${fenced(input)}`;
    } else if ('code' in input) {
      const language = input.language ? `${input.language} ` : '';
      const where = input.path ? ` from ${input.path}` : '';
      prompt = `Review this ${language}code${where}:\n\n${fenced(input.code, input.language)}`;
    } else {
      throw new AdapterError('rejected', `code-analysis ${descriptor.id} needs code, got ${describeInput(input)} input`);
    }

    let raw: string;
    try {
      const result = await this.client.generate(runtimeModelName(descriptor), prompt, {
        system: parameters.system ?? SYSTEM_PROMPT,
        format: 'json',
        temperature: parameters.temperature ?? 0.2,
        maxTokens: parameters.maxTokens,
        signal,
      });
      raw = result.response;
    } catch (error) {
      throw toAdapterError(error, `code-analysis ${descriptor.id}`);
    }

    const reply = parseJsonReply(raw, CodeReviewReplySchema, `code-analysis ${descriptor.id}`);
    return { kind: 'code-analysis', ...reply };
  }

  probe(descriptor: ModelDescriptor, signal: AbortSignal): Promise<boolean> {
    return hasOllamaModel(this.client, descriptor, signal);
  }
}
