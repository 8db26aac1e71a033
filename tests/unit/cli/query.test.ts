import { describe, it, expect } from 'vitest';
import { buildQueryRequest } from '../../../src/cli/commands/query.js';
import { parseInteger, parseNumber } from '../../../src/cli/commands/shared.js';

describe('buildQueryRequest', () => {
  it('should include only the input and tier when no options are given', () => {
    expect(buildQueryRequest('hello', { tier: '2' })).toEqual({ input: 'hello', callerTier: 2 });
  });

  it('should carry every provided option into the request', () => {
    const request = buildQueryRequest('summarize this', {
      tier: '1',
      model: 'mistral',
      task: 'analyze',
      system: 'Be brief.',
      temperature: '0.5',
      maxTokens: '128',
      timeout: '5000',
    });

    expect(request).toEqual({
      input: 'summarize this',
      callerTier: 1,
      modelId: 'mistral',
      taskType: 'analyze',
      parameters: { temperature: 0.5, maxTokens: 128, system: 'Be brief.' },
      timeoutMs: 5000,
    });
  });

  it('should leave range checks to the request schema', () => {
    expect(buildQueryRequest('hi', { tier: '9', temperature: '7' })).toEqual({
      input: 'hi',
      callerTier: 9,
      parameters: { temperature: 7 },
    });
  });

  it('should reject a non-numeric tier', () => {
    expect(() => buildQueryRequest('hi', { tier: 'admin' })).toThrow('tier must be a number, got "admin"');
  });

  it('should reject a fractional max-tokens value', () => {
    expect(() => buildQueryRequest('hi', { tier: '0', maxTokens: '1.5' })).toThrow(
      'max-tokens must be an integer, got "1.5"',
    );
  });
});

describe('parseNumber', () => {
  it('should parse decimal strings', () => {
    expect(parseNumber('0.25', 'temperature')).toBe(0.25);
  });

  it('should reject blank strings', () => {
    expect(() => parseNumber('  ', 'temperature')).toThrow('temperature must be a number, got "  "');
  });
});

describe('parseInteger', () => {
  it('should parse whole numbers', () => {
    expect(parseInteger('4', 'tier')).toBe(4);
  });

  it('should reject values with a fractional part', () => {
    expect(() => parseInteger('2.5', 'tier')).toThrow('tier must be an integer, got "2.5"');
  });
});
