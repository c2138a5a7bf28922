/**
 * Tests for time helpers
 */

import { describe, it, expect } from 'vitest';
import {
  clampTimeComponents,
  formatDuration,
  formatTime,
  isValidTimeComponents,
  toSeconds,
  toTimeComponents,
} from '../time';

describe('formatTime', () => {
  it('should format minutes and padded seconds', () => {
    expect(formatTime(0)).toBe('0:00');
    expect(formatTime(65)).toBe('1:05');
    expect(formatTime(754.9)).toBe('12:34');
  });

  it('should include milliseconds when asked', () => {
    expect(formatTime(12.5, true)).toBe('0:12.500');
    expect(formatTime(61.007, true)).toBe('1:01.007');
  });

  it('should round to the nearest millisecond', () => {
    expect(formatTime(2.9999996, true)).toBe('0:03.000');
  });

  it('should clamp negative values to zero', () => {
    expect(formatTime(-4, true)).toBe('0:00.000');
  });
});

describe('toTimeComponents / toSeconds', () => {
  it('should split seconds into components', () => {
    expect(toTimeComponents(125.25)).toEqual({ minutes: 2, seconds: 5, milliseconds: 250 });
  });

  it('should combine components into seconds', () => {
    expect(toSeconds(2, 5, 250)).toBe(125.25);
    expect(toSeconds(1, 30)).toBe(90);
  });
});

describe('component checks', () => {
  it('should validate component ranges', () => {
    expect(isValidTimeComponents({ minutes: 3, seconds: 59, milliseconds: 999 })).toBe(true);
    expect(isValidTimeComponents({ minutes: 3, seconds: 60, milliseconds: 0 })).toBe(false);
    expect(isValidTimeComponents({ minutes: 1000, seconds: 0, milliseconds: 0 })).toBe(false);
  });

  it('should clamp out-of-range components', () => {
    expect(clampTimeComponents({ minutes: 1200, seconds: 75, milliseconds: -3 })).toEqual({
      minutes: 999,
      seconds: 59,
      milliseconds: 0,
    });
  });
});

describe('formatDuration', () => {
  it('should format the length of a clip', () => {
    expect(formatDuration(10, 72.5)).toBe('1:02.500');
    expect(formatDuration(10, 72.5, false)).toBe('1:02');
  });
});
