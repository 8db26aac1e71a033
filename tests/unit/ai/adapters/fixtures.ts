import { vi } from 'vitest';
import type { ModelDescriptor } from '../../../../src/ai/types.js';

export const mockFetch = vi.fn<typeof fetch>();

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), { status, statusText, headers: { 'Content-Type': 'application/json' } });
}

/** Body of the n-th fetch call (default: the last one), parsed from JSON. */
export function requestBody(index = -1): unknown {
  const init = mockFetch.mock.calls.at(index)?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

export function requestUrl(index = -1): string {
  return String(mockFetch.mock.calls.at(index)?.[0]);
}

export function descriptor(overrides: Partial<ModelDescriptor> = {}): ModelDescriptor {
  return {
    id: 'llama2',
    backendKind: 'general-model',
    requiredTier: 1,
    capabilities: ['chat'],
    health: 'healthy',
    ...overrides,
  };
}

export const signal = (): AbortSignal => new AbortController().signal;
