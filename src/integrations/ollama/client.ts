/**
 * Ollama Integration Client
 *
 * Thin HTTP client for a local Ollama runtime. Backend adapters build on it;
 * it knows nothing about tiers, registries or canonical result shapes.
 *
 * Failures are thrown as-is (fetch errors, aborts) or as OllamaApiError
 * carrying the HTTP status, so adapters can tell transient from permanent.
 *
 * API Reference: https://github.com/ollama/ollama/blob/main/docs/api.md
 */

import { createLogger } from '../../utils/logger.js';

const logger = createLogger('switchyard:ollama-client');

const DEFAULT_BASE_URL = 'http://127.0.0.1:11434';

export interface OllamaModel {
  name: string;
  modifiedAt: string;
  size: number;
  digest: string;
  parameterSize: string;
  quantizationLevel: string;
}

export interface GenerateOptions {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  system?: string;
  /** Base64-encoded images for multimodal models */
  images?: string[];
  /** Constrain output; 'json' asks the model for a single JSON value */
  format?: 'json';
  signal?: AbortSignal;
}

export interface GenerateResult {
  response: string;
  model: string;
  totalDuration: number;
  promptEvalCount: number;
  evalCount: number;
}

export interface ChatMessage {
  role: string;
  content: string;
}

export class OllamaApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly endpoint: string
  ) {
    super(`Ollama API error: ${status} ${statusText} (${endpoint})`);
    this.name = 'OllamaApiError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Ollama API client for local LLM operations
 */
export class OllamaClient {
  private readonly baseUrl: string;

  /**
   * @param baseUrl - Base URL for Ollama API (defaults to http://127.0.0.1:11434)
   */
  constructor(baseUrl?: string) {
    this.baseUrl = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');

    if (!this.baseUrl.includes('127.0.0.1') && !this.baseUrl.includes('localhost')) {
      logger.warn({ baseUrl: this.baseUrl }, 'Ollama base URL is not loopback-only');
    }
  }

  /**
   * Single-prompt completion via /api/generate.
   */
  async generate(model: string, prompt: string, options?: GenerateOptions): Promise<GenerateResult> {
    const body: Record<string, unknown> = {
      model,
      prompt,
      stream: false,
      options: this.buildModelOptions(options),
    };

    if (options?.system) body.system = options.system;
    if (options?.images && options.images.length > 0) body.images = options.images;
    if (options?.format) body.format = options.format;

    const data = await this.post('/api/generate', body, options?.signal);
    const response = data.response;
    if (typeof response !== 'string') {
      throw new SyntaxError('Ollama /api/generate response is missing "response"');
    }

    return {
      response,
      model: typeof data.model === 'string' ? data.model : model,
      totalDuration: numberField(data, 'total_duration'),
      promptEvalCount: numberField(data, 'prompt_eval_count'),
      evalCount: numberField(data, 'eval_count'),
    };
  }

  /**
   * Chat completion with message history via /api/chat.
   */
  async chat(model: string, messages: ChatMessage[], options?: GenerateOptions): Promise<GenerateResult> {
    const body: Record<string, unknown> = {
      model,
      messages,
      stream: false,
      options: this.buildModelOptions(options),
    };

    if (options?.format) body.format = options.format;

    const data = await this.post('/api/chat', body, options?.signal);
    const message = data.message;
    if (!isRecord(message) || typeof message.content !== 'string') {
      throw new SyntaxError('Ollama /api/chat response is missing "message.content"');
    }

    return {
      response: message.content,
      model: typeof data.model === 'string' ? data.model : model,
      totalDuration: numberField(data, 'total_duration'),
      promptEvalCount: numberField(data, 'prompt_eval_count'),
      evalCount: numberField(data, 'eval_count'),
    };
  }

  /**
   * Models installed in the runtime.
   */
  async listModels(signal?: AbortSignal): Promise<OllamaModel[]> {
    const url = `${this.baseUrl}/api/tags`;
    const response = await fetch(url, { method: 'GET', signal });

    if (!response.ok) {
      throw new OllamaApiError(response.status, response.statusText, '/api/tags');
    }

    const data: unknown = await response.json();
    const models = isRecord(data) && Array.isArray(data.models) ? data.models : [];

    return models.filter(isRecord).map((model) => {
      const details = isRecord(model.details) ? model.details : {};
      return {
        name: String(model.name ?? ''),
        modifiedAt: String(model.modified_at ?? ''),
        size: typeof model.size === 'number' ? model.size : 0,
        digest: String(model.digest ?? ''),
        parameterSize: typeof details.parameter_size === 'string' ? details.parameter_size : 'unknown',
        quantizationLevel:
          typeof details.quantization_level === 'string' ? details.quantization_level : 'unknown',
      };
    });
  }

  /**
   * Check if Ollama is reachable
   */
  async isAvailable(timeoutMs: number = 5000): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(timeoutMs),
      });
      return response.ok;
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : 'Unknown error';
      logger.debug({ error: msg }, 'Ollama not available');
      return false;
    }
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private buildModelOptions(options?: GenerateOptions): Record<string, number> {
    const modelOptions: Record<string, number> = {};
    if (options?.temperature !== undefined) modelOptions.temperature = options.temperature;
    if (options?.topP !== undefined) modelOptions.top_p = options.topP;
    if (options?.maxTokens !== undefined) modelOptions.num_predict = options.maxTokens;
    return modelOptions;
  }

  private async post(
    endpoint: string,
    body: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    try {
      const response = await fetch(`${this.baseUrl}${endpoint}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      });

      if (!response.ok) {
        throw new OllamaApiError(response.status, response.statusText, endpoint);
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) {
        throw new SyntaxError(`Ollama ${endpoint} returned a non-object body`);
      }
      return data;
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : 'Unknown error';
      logger.error({ error: msg, endpoint, model: body.model }, 'Ollama request failed');
      throw error;
    }
  }
}
