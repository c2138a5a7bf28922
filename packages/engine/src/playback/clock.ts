/**
 * Pure position math for playback sessions. No device access.
 */

import type { PlaybackSession } from '../types';

/**
 * Position in seconds for a session at `now` (epoch ms).
 *
 * A halting session is still audible, so it keeps advancing like a playing one.
 */
export function currentPosition(session: PlaybackSession | null, now: number): number {
  if (!session) return 0;

  switch (session.status) {
    case 'playing':
    case 'halting':
      return session.accumulatedOffset + Math.max(0, now - session.startedAt) / 1000;
    case 'paused':
      return session.pausedAt ?? session.accumulatedOffset;
    case 'stopped':
      return 0;
  }
}
