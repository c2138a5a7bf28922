/**
 * Tests for EventEmitter
 */

import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from '../events';

type TestEvents = {
  tick: number;
  done: null;
};

describe('EventEmitter', () => {
  it('should deliver data to listeners', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on('tick', listener);

    expect(emitter.emit('tick', 3)).toBe(true);
    expect(listener).toHaveBeenCalledWith(3);
  });

  it('should report when nobody is listening', () => {
    const emitter = new EventEmitter<TestEvents>();
    expect(emitter.emit('done', null)).toBe(false);
  });

  it('should call once-listeners a single time', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once('tick', listener);

    emitter.emit('tick', 1);
    emitter.emit('tick', 2);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount('tick')).toBe(0);
  });

  it('should remove listeners', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.on('tick', listener).off('tick', listener);

    emitter.emit('tick', 1);

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.eventNames()).toEqual([]);
  });

  it('should remove all listeners for one event or every event', () => {
    const emitter = new EventEmitter<TestEvents>();
    emitter.on('tick', vi.fn());
    emitter.on('done', vi.fn());

    emitter.removeAllListeners('tick');
    expect(emitter.eventNames()).toEqual(['done']);

    emitter.removeAllListeners();
    expect(emitter.eventNames()).toEqual([]);
  });

  it('should keep delivering after a listener throws', () => {
    const emitter = new EventEmitter<TestEvents>();
    const after = vi.fn();
    emitter.on('tick', () => {
      throw new Error('listener failed');
    });
    emitter.on('tick', after);

    expect(() => emitter.emit('tick', 1)).not.toThrow();
    expect(after).toHaveBeenCalledWith(1);
  });

  it('should count listeners', () => {
    const emitter = new EventEmitter<TestEvents>({ maxListeners: 1 });
    emitter.on('tick', vi.fn());
    emitter.on('tick', vi.fn());

    expect(emitter.listenerCount('tick')).toBe(2);
    expect(emitter.listenerCount('done')).toBe(0);
  });
});
