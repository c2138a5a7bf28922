/**
 * Tests for FadeController
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FadeController } from '../FadeController';
import { Scheduler } from '../Scheduler';

function expectNonIncreasing(values: number[]): void {
  values.slice(1).forEach((value, i) => {
    expect(value).toBeLessThanOrEqual(values[i]);
  });
}

describe('FadeController', () => {
  let scheduler: Scheduler;
  let writes: number[];
  let fades: FadeController;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new Scheduler();
    writes = [];
    fades = new FadeController({
      scheduler,
      setVolume: (volume) => writes.push(volume),
    });
  });

  afterEach(() => {
    fades.cancelAll();
    scheduler.cancelAll();
    vi.useRealTimers();
  });

  describe('startNaturalFadeOut', () => {
    it('should write the first step immediately', () => {
      fades.startNaturalFadeOut(0.8);

      expect(writes).toHaveLength(1);
      expect(writes[0]).toBeCloseTo(0.76, 10);
      expect(fades.getActive()?.kind).toBe('natural');
    });

    it('should reach exactly 0 in 20 steps over 0.5s', () => {
      fades.startNaturalFadeOut(0.8);

      vi.advanceTimersByTime(474);
      expect(writes).toHaveLength(19);
      expect(fades.isActive()).toBe(true);

      vi.advanceTimersByTime(1);
      expect(writes).toHaveLength(20);
      expect(writes[19]).toBe(0);
      expect(fades.isActive()).toBe(false);
      expect(scheduler.isPending('fadeStep')).toBe(false);
    });

    it('should descend in equal steps of baseVolume / 20', () => {
      fades.startNaturalFadeOut(0.8);
      vi.advanceTimersByTime(500);

      writes.forEach((volume, i) => {
        expect(volume).toBeCloseTo(0.8 - 0.04 * (i + 1), 10);
      });
    });

    it('should stay within 0 and the base volume', () => {
      fades.startNaturalFadeOut(0.8);
      vi.advanceTimersByTime(1000);

      expectNonIncreasing(writes);
      writes.forEach((volume) => {
        expect(volume).toBeGreaterThanOrEqual(0);
        expect(volume).toBeLessThanOrEqual(0.8);
      });
    });
  });

  describe('startHaltFadeOut', () => {
    it('should fade from the given volume in 40 steps and complete once', () => {
      const onComplete = vi.fn();
      fades.startHaltFadeOut(0.6, onComplete);

      expect(writes[0]).toBeCloseTo(0.585, 10);

      vi.advanceTimersByTime(974);
      expect(writes).toHaveLength(39);
      expect(onComplete).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(writes).toHaveLength(40);
      expect(writes[39]).toBe(0);
      expect(onComplete).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(5000);
      expect(onComplete).toHaveBeenCalledTimes(1);
      expectNonIncreasing(writes);
    });

    it('should pre-empt a natural fade in progress', () => {
      fades.startNaturalFadeOut(1.0);
      vi.advanceTimersByTime(100);
      expect(writes).toHaveLength(5);
      expect(fades.activeKind()).toBe('natural');
      const natural = writes.length;

      const onComplete = vi.fn();
      fades.startHaltFadeOut(0.75, onComplete);
      expect(fades.activeKind()).toBe('halt');
      vi.advanceTimersByTime(2000);
      expect(fades.activeKind()).toBeNull();

      const halt = writes.slice(natural);
      expect(halt).toHaveLength(40);
      expect(halt[0]).toBeCloseTo(0.73125, 10);
      expectNonIncreasing(halt);
      expect(onComplete).toHaveBeenCalledTimes(1);
    });

    it('should complete immediately from silence', () => {
      const onComplete = vi.fn();
      fades.startHaltFadeOut(0, onComplete);

      expect(writes).toEqual([0]);
      expect(onComplete).toHaveBeenCalledTimes(1);
      expect(fades.isActive()).toBe(false);
    });
  });

  describe('cancelAll', () => {
    it('should stop further steps', () => {
      const onComplete = vi.fn();
      fades.startHaltFadeOut(1.0, onComplete);
      vi.advanceTimersByTime(50);
      const count = writes.length;

      fades.cancelAll();
      vi.advanceTimersByTime(2000);

      expect(writes).toHaveLength(count);
      expect(onComplete).not.toHaveBeenCalled();
      expect(fades.getActive()).toBeNull();
    });

    it('should be idempotent', () => {
      expect(() => {
        fades.cancelAll();
        fades.cancelAll();
      }).not.toThrow();
    });
  });

  it('should honour custom profiles', () => {
    const custom = new FadeController({
      scheduler,
      setVolume: (volume) => writes.push(volume),
      naturalFade: { steps: 4, durationMs: 100 },
    });

    custom.startNaturalFadeOut(1.0);
    expect(writes).toEqual([0.75]);

    vi.advanceTimersByTime(75);
    expect(writes).toEqual([0.75, 0.5, 0.25, 0]);
  });
});
