import { describe, it, expect } from 'vitest';
import { createLogger, formatError, redact } from '../../../src/utils/logger.js';

describe('Logger', () => {
  describe('createLogger', () => {
    it('should honour an explicit level', () => {
      expect(createLogger('test', { level: 'warn' }).level).toBe('warn');
    });

    it('should fall back to SWITCHYARD_LOG_LEVEL', () => {
      expect(createLogger('test').level).toBe('silent');
    });
  });

  describe('redact', () => {
    it('should mask sensitive keys by substring, case-insensitively', () => {
      expect(
        redact({ user: 'sam', apiKey: 'test-key', Authorization: 'Bearer test-token', password: 'test-secret' }),
      ).toEqual({
        user: 'sam',
        apiKey: '[REDACTED]',
        Authorization: '[REDACTED]',
        password: '[REDACTED]',
      });
    });

    it('should recurse into nested objects', () => {
      expect(redact({ backend: { url: 'http://127.0.0.1:11434', token: 'test-token' } })).toEqual({
        backend: { url: 'http://127.0.0.1:11434', token: '[REDACTED]' },
      });
    });

    it('should redact objects inside arrays and keep plain items', () => {
      expect(
        redact({ tags: ['chat', 'vision'], models: [{ id: 'llava', metadata: { endpoint: 'http://127.0.0.1', authHeader: 'x' } }] }),
      ).toEqual({
        tags: ['chat', 'vision'],
        models: [{ id: 'llava', metadata: { endpoint: 'http://127.0.0.1', authHeader: '[REDACTED]' } }],
      });
    });

    it('should apply additional field names', () => {
      expect(redact({ prompt: 'hello', model: 'llama2' }, ['prompt'])).toEqual({
        prompt: '[REDACTED]',
        model: 'llama2',
      });
    });
  });

  describe('formatError', () => {
    it('should extract message, name and string code from errors', () => {
      const error = Object.assign(new TypeError('bad input'), { code: 'E_INPUT' });
      const formatted = formatError(error);

      expect(formatted.message).toBe('bad input');
      expect(formatted.name).toBe('TypeError');
      expect(formatted.code).toBe('E_INPUT');
      expect(formatted.stack).toContain('bad input');
    });

    it('should ignore non-string codes', () => {
      const error = Object.assign(new Error('boom'), { code: 42 });
      expect(formatError(error).code).toBeUndefined();
    });

    it('should stringify non-error values', () => {
      expect(formatError('plain failure')).toEqual({ message: 'plain failure' });
    });
  });
});
