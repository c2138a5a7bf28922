/**
 * Playback types and interfaces
 */

import type { Song } from './playlist';

/**
 * Playback mode of a session
 */
export type PlaybackMode = 'preview' | 'song';

/**
 * Transport status
 */
export type TransportStatus = 'stopped' | 'playing' | 'paused' | 'halting';

/**
 * Kind of volume ramp
 */
export type FadeKind = 'natural' | 'halt';

/**
 * Named timer slots. Each slot holds at most one pending timer.
 */
export type ScheduleSlot = 'fadeStart' | 'songEnd' | 'positionPoll' | 'fadeStep';

/**
 * Audio output device the engine drives.
 *
 * Every method is synchronous; failures are thrown.
 */
export interface AudioBackend {
  load(filePath: string): void;
  /** Start playback at the given offset in seconds */
  play(startOffset: number): void;
  pause(): void;
  resume(): void;
  stop(): void;
  /** Volume in the range 0-1 */
  setVolume(volume: number): void;
  /** Whether the device is currently producing audio */
  isBusy(): boolean;
}

/**
 * Hooks the engine calls back into. All optional.
 */
export interface PlaybackHooks {
  /** Preview position in seconds; 0 when a preview stops */
  onPosition?: (seconds: number) => void;
  /** A full-song session reached its end time */
  onSongFinished?: () => void;
  /** A halt fade reached silence and the device was stopped */
  onHaltCompleted?: () => void;
}

/**
 * One playback run, from a play call to its stop or halt.
 * Replaced on every play call.
 */
export interface PlaybackSession {
  id: number;
  mode: PlaybackMode;
  /** Target volume: the song's volume, or 1.0 for previews */
  baseVolume: number;
  startPosition: number;
  /** Preview end in seconds; null for full songs */
  endPosition: number | null;
  /** Epoch ms when the current unpaused run began */
  startedAt: number;
  /** Position in seconds at which the current run began */
  accumulatedOffset: number;
  /** Position frozen by a pause; null when no pause is recorded */
  pausedAt: number | null;
  status: TransportStatus;
  song: Song | null;
}

/**
 * Step and timing profile of a fade
 */
export interface FadeProfile {
  steps: number;
  durationMs: number;
}

/**
 * A live volume ramp to silence
 */
export interface FadeSequence {
  id: number;
  kind: FadeKind;
  stepCount: number;
  durationMs: number;
  startVolume: number;
  currentVolume: number;
  stepsTaken: number;
  cancelled: boolean;
}

/**
 * Engine configuration
 */
export interface EngineConfig {
  /** Fade used when a song reaches its end time */
  naturalFade?: FadeProfile;
  /** Fade used when an operator halts a song */
  haltFade?: FadeProfile;
  /** Seconds before song end at which the natural fade starts */
  fadeLeadTime?: number;
  /** Preview position polling interval in ms */
  positionPollInterval?: number;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Read-only engine snapshot
 */
export interface EngineState {
  status: TransportStatus;
  mode: PlaybackMode | null;
  /** Last volume written to the device */
  volume: number;
  /** Position in seconds */
  position: number;
  /** Paused preview position, if any */
  pausedAt: number | null;
  pendingTimers: ScheduleSlot[];
  fade: {
    kind: FadeKind;
    volume: number;
    stepsTaken: number;
    stepCount: number;
  } | null;
  song: Song | null;
}
