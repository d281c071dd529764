import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';

const CHANGED = { count: 3, reason: 'replace' } as const;

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should deliver events synchronously to subscribers', () => {
    const handler = vi.fn();

    eventBus.on('alerts:changed', handler);
    eventBus.emit('alerts:changed', CHANGED);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(CHANGED);
  });

  it('should unsubscribe via returned function and stop receiving events', () => {
    const handler = vi.fn();

    const unsubscribe = eventBus.on('alerts:changed', handler);
    eventBus.emit('alerts:changed', CHANGED);
    unsubscribe();
    eventBus.emit('alerts:changed', CHANGED);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should remove specific handler with off()', () => {
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    eventBus.on('mutation:confirmed', handler1);
    eventBus.on('mutation:confirmed', handler2);
    eventBus.off('mutation:confirmed', handler1);
    eventBus.emit('mutation:confirmed', { alertId: 'a-1', action: 'close' });

    expect(handler1).not.toHaveBeenCalled();
    expect(handler2).toHaveBeenCalledTimes(1);
  });

  it('should isolate a throwing handler and report it', () => {
    const failing = vi.fn(() => {
      throw new Error('render failed');
    });
    const healthy = vi.fn();
    const reported = vi.fn();

    eventBus.on('alerts:changed', failing);
    eventBus.on('alerts:changed', healthy);
    eventBus.on('system:handler_error', reported);

    expect(() => eventBus.emit('alerts:changed', CHANGED)).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(reported).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'alerts:changed', error: 'render failed' })
    );
  });

  it('should not recurse when a handler_error handler throws', () => {
    const reporter = vi.fn(() => {
      throw new Error('reporter failed');
    });
    eventBus.on('system:handler_error', reporter);
    eventBus.on('notify', () => {
      throw new Error('notify failed');
    });

    expect(() =>
      eventBus.emit('notify', { level: 'info', message: 'hello', timestamp: new Date() })
    ).not.toThrow();
    expect(reporter).toHaveBeenCalledTimes(1);
  });

  it('should let a handler unsubscribe itself during emit', () => {
    const calls: string[] = [];
    const unsubscribe = eventBus.on('alerts:changed', () => {
      calls.push('self-removing');
      unsubscribe();
    });
    eventBus.on('alerts:changed', () => calls.push('second'));

    eventBus.emit('alerts:changed', CHANGED);
    eventBus.emit('alerts:changed', CHANGED);

    expect(calls).toEqual(['self-removing', 'second', 'second']);
  });
});
