/**
 * Core type definitions for CueDeck
 */

import type { AudioBackend, EngineConfig } from './playback';
import type { Song } from './playlist';
import type { LogLevel } from '../utils/logger';

// ============================================================================
// Configuration
// ============================================================================

export interface CueDeckConfig {
  /** Audio output device */
  backend: AudioBackend;
  /** Engine timing overrides */
  engine?: EngineConfig;
  debug?: boolean;
  logLevel?: LogLevel;
}

// ============================================================================
// Controller Events
// ============================================================================

export interface NowPlaying {
  song: Song;
  /** Zero-based playlist index */
  index: number;
  total: number;
}

export interface PlaybackFailure {
  error: Error;
  song: Song | null;
}

export type CueDeckEvents = {
  position: number;
  songchange: NowPlaying;
  songfinished: NowPlaying | null;
  haltcompleted: NowPlaying | null;
  playlistcomplete: { total: number };
  playliststop: null;
  error: PlaybackFailure;
};

// ============================================================================
// Playback Types (re-exported from playback.ts)
// ============================================================================

export type {
  AudioBackend,
  EngineConfig,
  EngineState,
  FadeKind,
  FadeProfile,
  FadeSequence,
  PlaybackHooks,
  PlaybackMode,
  PlaybackSession,
  ScheduleSlot,
  TransportStatus,
} from './playback';

// ============================================================================
// Playlist Types (re-exported from playlist.ts)
// ============================================================================

export type { Song, SongRecord, VolumePreset } from './playlist';

// ============================================================================
// Error Types (re-exported from errors.ts)
// ============================================================================

export {
  CueDeckError,
  LoadFailureError,
  PlaybackError,
  ValidationError,
  InvalidRangeError,
  StorageError,
} from './errors';
