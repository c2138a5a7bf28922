/**
 * Tests for Scheduler
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Scheduler } from '../Scheduler';

describe('Scheduler', () => {
  let scheduler: Scheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new Scheduler();
  });

  afterEach(() => {
    scheduler.cancelAll();
    vi.useRealTimers();
  });

  it('should run a callback after its delay', () => {
    const callback = vi.fn();
    scheduler.schedule('songEnd', 100, callback);

    vi.advanceTimersByTime(99);
    expect(callback).not.toHaveBeenCalled();
    expect(scheduler.isPending('songEnd')).toBe(true);

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(scheduler.isPending('songEnd')).toBe(false);
  });

  it('should replace a pending timer in the same slot', () => {
    const first = vi.fn();
    const second = vi.fn();

    scheduler.schedule('fadeStart', 50, first);
    scheduler.schedule('fadeStart', 80, second);

    vi.advanceTimersByTime(200);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should keep slots independent', () => {
    const fade = vi.fn();
    const end = vi.fn();

    scheduler.schedule('fadeStart', 50, fade);
    scheduler.schedule('songEnd', 100, end);
    scheduler.cancel('fadeStart');

    vi.advanceTimersByTime(100);
    expect(fade).not.toHaveBeenCalled();
    expect(end).toHaveBeenCalledTimes(1);
  });

  it('should treat cancelling a fired or unknown slot as a no-op', () => {
    const callback = vi.fn();
    scheduler.schedule('positionPoll', 10, callback);
    vi.advanceTimersByTime(10);

    expect(() => scheduler.cancel('positionPoll')).not.toThrow();
    expect(() => scheduler.cancel('fadeStep')).not.toThrow();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should cancel every slot at once', () => {
    const callbacks = [vi.fn(), vi.fn(), vi.fn()];
    scheduler.schedule('fadeStart', 10, callbacks[0]);
    scheduler.schedule('songEnd', 20, callbacks[1]);
    scheduler.schedule('positionPoll', 30, callbacks[2]);
    expect(scheduler.pendingCount()).toBe(3);

    scheduler.cancelAll();

    expect(scheduler.pendingCount()).toBe(0);
    vi.advanceTimersByTime(100);
    callbacks.forEach((callback) => expect(callback).not.toHaveBeenCalled());
  });

  it('should let a callback re-arm its own slot', () => {
    let ticks = 0;
    const tick = () => {
      ticks++;
      if (ticks < 3) {
        scheduler.schedule('positionPoll', 10, tick);
      }
    };
    scheduler.schedule('positionPoll', 10, tick);

    vi.advanceTimersByTime(100);
    expect(ticks).toBe(3);
    expect(scheduler.isPending('positionPoll')).toBe(false);
  });

  it('should contain errors thrown by callbacks', () => {
    const after = vi.fn();
    scheduler.schedule('fadeStep', 10, () => {
      throw new Error('boom');
    });
    scheduler.schedule('songEnd', 20, after);

    expect(() => vi.advanceTimersByTime(20)).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingCount()).toBe(0);
  });

  it('should list pending slots in arming order', () => {
    scheduler.schedule('fadeStart', 10, vi.fn());
    scheduler.schedule('songEnd', 20, vi.fn());

    expect(scheduler.pendingSlots()).toEqual(['fadeStart', 'songEnd']);
  });
});
