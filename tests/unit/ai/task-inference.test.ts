import { describe, it, expect } from 'vitest';
import { inferTaskType } from '../../../src/ai/task-inference.js';

describe('inferTaskType', () => {
  it('should treat free text and conversations as chat', () => {
    expect(inferTaskType('hello')).toBe('chat');
    expect(inferTaskType({ messages: [{ role: 'user', content: 'hi' }] })).toBe('chat');
  });

  it('should map structured inputs to their task', () => {
    expect(inferTaskType({ image: 'aGVsbG8=' })).toBe('vision');
    expect(inferTaskType({ code: 'x = 1' })).toBe('code-analysis');
    expect(inferTaskType({ text: 'is this spam?' })).toBe('classify');
  });
});
