import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GeneralModelAdapter } from '../../../../src/ai/adapters/general-model.js';
import { AdapterError } from '../../../../src/ai/errors.js';
import { OllamaClient } from '../../../../src/integrations/ollama/client.js';
import { descriptor, jsonResponse, mockFetch, requestBody, requestUrl, signal } from './fixtures.js';

const reply = (content: string): Response => jsonResponse({ message: { role: 'assistant', content }, model: 'llama2' });

describe('GeneralModelAdapter', () => {
  let adapter: GeneralModelAdapter;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    adapter = new GeneralModelAdapter({ client: new OllamaClient(), reconnectDelayMs: 0 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should chat with the system prompt first and return a trimmed assistant message', async () => {
    mockFetch.mockResolvedValueOnce(reply('  Hi there \n'));

    const result = await adapter.invoke(
      descriptor(),
      { input: 'hello', taskType: 'chat', parameters: { system: 'Be brief.', temperature: 0.3, maxTokens: 64 } },
      signal(),
    );

    expect(result).toEqual({ kind: 'chat', message: { role: 'assistant', content: 'Hi there' } });
    expect(requestUrl()).toBe('http://127.0.0.1:11434/api/chat');
    expect(requestBody()).toEqual({
      model: 'llama2',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hello' },
      ],
      stream: false,
      options: { temperature: 0.3, num_predict: 64 },
    });
  });

  it('should address the runtime by metadata.runtimeModel when set', async () => {
    mockFetch.mockResolvedValueOnce(reply('ok'));

    await adapter.invoke(
      descriptor({ id: 'big-llama', metadata: { runtimeModel: 'llama2:13b' } }),
      { input: 'hello', taskType: 'chat', parameters: {} },
      signal(),
    );

    expect(requestBody()).toMatchObject({ model: 'llama2:13b' });
  });

  it('should wrap the question in the post context', async () => {
    mockFetch.mockResolvedValueOnce(reply('ok'));

    await adapter.invoke(
      descriptor(),
      {
        input: 'What is this about?',
        taskType: 'chat',
        parameters: { context: { title: 'Release notes', content: 'Version 2 ships today.' } },
      },
      signal(),
    );

    expect(requestBody()).toMatchObject({
      messages: [
        {
          role: 'user',
          content: [
            'You are viewing a post titled: "Release notes"',
            '',
            'Post content excerpt:',
            'Version 2 ships today.',
            '',
            'User question: What is this about?',
            '',
            'Please answer based on the post content above.',
          ].join('\n'),
        },
      ],
    });
  });

  it('should reject image input without calling the runtime', async () => {
    const error = await adapter
      .invoke(descriptor(), { input: { image: 'aGVsbG8=' }, taskType: 'vision', parameters: {} }, signal())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AdapterError);
    expect(error).toMatchObject({ reason: 'rejected', transient: false });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should reconnect once after a connection failure', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed')).mockResolvedValueOnce(reply('back'));

    const result = await adapter.invoke(descriptor(), { input: 'hello', taskType: 'chat', parameters: {} }, signal());

    expect(result).toEqual({ kind: 'chat', message: { role: 'assistant', content: 'back' } });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should report a connection failure once reconnects are used up', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    const error = await adapter
      .invoke(descriptor(), { input: 'hello', taskType: 'chat', parameters: {} }, signal())
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ reason: 'connection', transient: true });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should not reconnect on an overloaded runtime', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'busy' }, 503, 'Service Unavailable'));

    const error = await adapter
      .invoke(descriptor(), { input: 'hello', taskType: 'chat', parameters: {} }, signal())
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ reason: 'overloaded', transient: true });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should treat a reply without content as malformed', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant' } }));

    const error = await adapter
      .invoke(descriptor(), { input: 'hello', taskType: 'chat', parameters: {} }, signal())
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ reason: 'malformed_response' });
  });

  describe('probe', () => {
    it('should find the model by name or name:latest', async () => {
      mockFetch.mockImplementation(async () => jsonResponse({ models: [{ name: 'llama2:latest' }, { name: 'phi:2.7b' }] }));

      expect(await adapter.probe(descriptor(), signal())).toBe(true);
      expect(await adapter.probe(descriptor({ id: 'phi' }), signal())).toBe(false);
      expect(await adapter.probe(descriptor({ id: 'mistral' }), signal())).toBe(false);
    });
  });
});
