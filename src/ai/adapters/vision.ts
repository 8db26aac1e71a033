import { z } from 'zod';
import type { OllamaClient } from '../../integrations/ollama/client.js';
import { AdapterError, toAdapterError } from '../errors.js';
import { describeInput } from '../task-inference.js';
import type { ModelDescriptor, VisionResult } from '../types.js';
import { hasOllamaModel } from './general-model.js';
import { parseJsonReply } from './prompting.js';
import { type AdapterRequest, type BackendAdapter, runtimeModelName } from './types.js';

const VisionReplySchema = z.object({
  description: z.string(),
  labels: z.array(z.string()).default([]),
  text: z.string().optional(),
});

const DEFAULT_PROMPT = 'Describe this image.';

const REPLY_INSTRUCTIONS =
  'Respond with a single JSON object: {"description": string, "labels": string[], "text": string}. ' +
  '"labels" lists the main objects, patterns and colours. "text" is any legible text in the image; omit it when there is none.';

/**
 * Multimodal models (llava and friends) behind an Ollama runtime.
 */
export class VisionAdapter implements BackendAdapter {
  readonly kind = 'vision' as const;

  constructor(private readonly client: OllamaClient) {}

  async invoke(descriptor: ModelDescriptor, request: AdapterRequest, signal: AbortSignal): Promise<VisionResult> {
    const { input, parameters } = request;
    if (typeof input === 'string' || !('image' in input)) {
      throw new AdapterError('rejected', `vision ${descriptor.id} needs an image, got ${describeInput(input)} input`);
    }

    const prompt = `${input.prompt ?? DEFAULT_PROMPT}\n\n${REPLY_INSTRUCTIONS}`;

    let raw: string;
    try {
      const result = await this.client.generate(runtimeModelName(descriptor), prompt, {
        images: [input.image],
        format: 'json',
        system: parameters.system,
        temperature: parameters.temperature,
        maxTokens: parameters.maxTokens,
        signal,
      });
      raw = result.response;
    } catch (error) {
      throw toAdapterError(error, `vision ${descriptor.id}`);
    }

    const reply = parseJsonReply(raw, VisionReplySchema, `vision ${descriptor.id}`);
    const text = reply.text?.trim();

    return {
      kind: 'vision',
      description: reply.description.trim(),
      labels: reply.labels,
      ...(text ? { text } : {}),
    };
  }

  probe(descriptor: ModelDescriptor, signal: AbortSignal): Promise<boolean> {
    return hasOllamaModel(this.client, descriptor, signal);
  }
}
