import type { OllamaClient } from '../../integrations/ollama/client.js';
import { adapterLogger as log } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { AdapterError, toAdapterError } from '../errors.js';
import { describeInput } from '../task-inference.js';
import type { ChatResult, ModelDescriptor } from '../types.js';
import { buildChatMessages } from './prompting.js';
import { type AdapterRequest, type BackendAdapter, runtimeModelName } from './types.js';

export interface GeneralModelAdapterOptions {
  client: OllamaClient;
  /** Low-level reconnects after a connection failure, invisible to the orchestrator (default 1) */
  reconnectAttempts?: number;
  reconnectDelayMs?: number;
}

/** Healthy when the runtime answers and has the model installed. */
export async function hasOllamaModel(
  client: OllamaClient,
  descriptor: ModelDescriptor,
  signal: AbortSignal,
): Promise<boolean> {
  const wanted = runtimeModelName(descriptor);
  const installed = await client.listModels(signal);
  return installed.some((model) => model.name === wanted || model.name === `${wanted}:latest`);
}

function isConnectionFailure(error: unknown): boolean {
  const normalized = toAdapterError(error, 'general-model');
  return normalized.reason === 'connection';
}

/**
 * General-purpose language models served by an Ollama runtime.
 */
export class GeneralModelAdapter implements BackendAdapter {
  readonly kind = 'general-model' as const;
  private readonly client: OllamaClient;
  private readonly reconnectAttempts: number;
  private readonly reconnectDelayMs: number;

  constructor(options: GeneralModelAdapterOptions) {
    this.client = options.client;
    this.reconnectAttempts = options.reconnectAttempts ?? 1;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 250;
  }

  async invoke(descriptor: ModelDescriptor, request: AdapterRequest, signal: AbortSignal): Promise<ChatResult> {
    const messages = buildChatMessages(request.input, request.parameters);
    if (!messages) {
      throw new AdapterError('rejected', `general-model ${descriptor.id} cannot take ${describeInput(request.input)} input`);
    }

    const model = runtimeModelName(descriptor);

    try {
      const result = await withRetry(
        () =>
          this.client.chat(model, messages, {
            temperature: request.parameters.temperature,
            maxTokens: request.parameters.maxTokens,
            signal,
          }),
        {
          maxAttempts: 1 + this.reconnectAttempts,
          initialDelayMs: this.reconnectDelayMs,
          retryIf: isConnectionFailure,
          onRetry: (_error, attempt, delayMs) => {
            log.debug({ model: descriptor.id, attempt, delayMs }, 'Reconnecting to general-model runtime');
          },
          signal,
        },
      );

      return {
        kind: 'chat',
        message: { role: 'assistant', content: result.response.trim() },
      };
    } catch (error) {
      throw toAdapterError(error, `general-model ${descriptor.id}`);
    }
  }

  probe(descriptor: ModelDescriptor, signal: AbortSignal): Promise<boolean> {
    return hasOllamaModel(this.client, descriptor, signal);
  }
}
