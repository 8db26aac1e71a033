import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should subscribe and receive events', () => {
    const handler = vi.fn();

    eventBus.on('model:deregistered', handler);
    eventBus.emit('model:deregistered', { modelId: 'llama2' });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ modelId: 'llama2' });
  });

  it('should unsubscribe via returned function and stop receiving events', () => {
    const handler = vi.fn();

    const unsubscribe = eventBus.on('model:deregistered', handler);
    eventBus.emit('model:deregistered', { modelId: 'first' });
    unsubscribe();
    eventBus.emit('model:deregistered', { modelId: 'second' });

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should remove a specific handler with off()', () => {
    const handler1 = vi.fn();
    const handler2 = vi.fn();
    eventBus.on('model:deregistered', handler1);
    eventBus.on('model:deregistered', handler2);

    eventBus.off('model:deregistered', handler1);
    eventBus.emit('model:deregistered', { modelId: 'llama2' });

    expect(handler1).not.toHaveBeenCalled();
    expect(handler2).toHaveBeenCalledTimes(1);
  });

  it('should fire once() handler only once', () => {
    const handler = vi.fn();

    eventBus.once('query:fallback', handler);
    eventBus.emit('query:fallback', { failedModelId: 'a', reason: 'timeout', taskType: 'chat' });
    eventBus.emit('query:fallback', { failedModelId: 'b', reason: 'timeout', taskType: 'chat' });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ failedModelId: 'a', reason: 'timeout', taskType: 'chat' });
  });

  it('should remove all listeners with clear()', () => {
    const handler = vi.fn();
    eventBus.on('model:deregistered', handler);
    eventBus.on('query:fallback', handler);

    eventBus.clear();

    expect(eventBus.listenerCount('model:deregistered')).toBe(0);
    expect(eventBus.listenerCount('query:fallback')).toBe(0);
    eventBus.emit('model:deregistered', { modelId: 'llama2' });
    expect(handler).not.toHaveBeenCalled();
  });

  it('should return correct listener count', () => {
    expect(eventBus.listenerCount('model:registered')).toBe(0);

    const handler1 = vi.fn();
    const handler2 = vi.fn();
    eventBus.on('model:registered', handler1);
    eventBus.on('model:registered', handler2);
    expect(eventBus.listenerCount('model:registered')).toBe(2);

    eventBus.off('model:registered', handler1);
    expect(eventBus.listenerCount('model:registered')).toBe(1);
  });

  it('should isolate a throwing handler from the others', () => {
    const failing = vi.fn(() => {
      throw new Error('Handler failed');
    });
    const handler2 = vi.fn();
    eventBus.on('model:deregistered', failing);
    eventBus.on('model:deregistered', handler2);

    expect(() => {
      eventBus.emit('model:deregistered', { modelId: 'llama2' });
    }).not.toThrow();

    expect(failing).toHaveBeenCalledTimes(1);
    expect(handler2).toHaveBeenCalledTimes(1);
    expect(eventBus.getHandlerErrorCount()).toBe(1);
  });

  it('should report handler failures as system:handler_error', () => {
    const reported = vi.fn();
    eventBus.on('system:handler_error', reported);
    eventBus.on('model:deregistered', () => {
      throw new Error('Handler failed');
    });

    eventBus.emit('model:deregistered', { modelId: 'llama2' });

    expect(reported).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'model:deregistered', error: 'Handler failed', handler: 'anonymous' }),
    );
  });

  it('should not recurse when a handler_error handler throws', () => {
    eventBus.on('system:handler_error', () => {
      throw new Error('also broken');
    });
    eventBus.on('model:deregistered', () => {
      throw new Error('broken');
    });

    eventBus.emit('model:deregistered', { modelId: 'llama2' });

    expect(eventBus.getHandlerErrorCount()).toBe(2);
  });
});
