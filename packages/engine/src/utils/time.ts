/**
 * Time formatting and conversion helpers for cue positions
 */

export interface TimeComponents {
  minutes: number;
  seconds: number;
  milliseconds: number;
}

const MAX_MINUTES = 999;

/**
 * Format seconds as `m:ss`, or `m:ss.mmm` with milliseconds
 */
export function formatTime(totalSeconds: number, includeMs = false): string {
  const { minutes, seconds, milliseconds } = toTimeComponents(totalSeconds);
  const base = `${minutes}:${String(seconds).padStart(2, '0')}`;
  return includeMs ? `${base}.${String(milliseconds).padStart(3, '0')}` : base;
}

export function toSeconds(minutes: number, seconds: number, milliseconds = 0): number {
  return minutes * 60 + seconds + milliseconds / 1000;
}

export function toTimeComponents(totalSeconds: number): TimeComponents {
  const clamped = Math.max(0, totalSeconds);
  // Round to whole ms first so 2.999999 does not render as 0:02.999
  const totalMs = Math.round(clamped * 1000);
  return {
    minutes: Math.floor(totalMs / 60000),
    seconds: Math.floor((totalMs % 60000) / 1000),
    milliseconds: totalMs % 1000,
  };
}

export function isValidTimeComponents({ minutes, seconds, milliseconds }: TimeComponents): boolean {
  return (
    minutes >= 0 &&
    minutes <= MAX_MINUTES &&
    seconds >= 0 &&
    seconds <= 59 &&
    milliseconds >= 0 &&
    milliseconds <= 999
  );
}

export function clampTimeComponents({
  minutes,
  seconds,
  milliseconds,
}: TimeComponents): TimeComponents {
  return {
    minutes: Math.max(0, Math.min(MAX_MINUTES, minutes)),
    seconds: Math.max(0, Math.min(59, seconds)),
    milliseconds: Math.max(0, Math.min(999, milliseconds)),
  };
}

/**
 * Format the length of a clip, milliseconds included by default
 */
export function formatDuration(start: number, end: number, includeMs = true): string {
  return formatTime(end - start, includeMs);
}
