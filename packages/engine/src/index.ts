/**
 * @cuedeck/engine
 *
 * Cue-list playback engine: timed fades, halt, preview and playlist control
 * over an external audio device
 *
 * @packageDocumentation
 */

// Main client
export { CueDeckClient } from './client';
export type { CueDeckState } from './client';

// Types
export type {
  // Configuration
  CueDeckConfig,
  EngineConfig,

  // Controller events
  CueDeckEvents,
  NowPlaying,
  PlaybackFailure,

  // Playback
  AudioBackend,
  PlaybackHooks,
  PlaybackMode,
  PlaybackSession,
  TransportStatus,
  EngineState,
  FadeKind,
  FadeProfile,
  FadeSequence,
  ScheduleSlot,

  // Playlist
  Song,
  SongRecord,
  VolumePreset,
} from './types';

// Errors
export {
  CueDeckError,
  LoadFailureError,
  PlaybackError,
  ValidationError,
  InvalidRangeError,
  StorageError,
} from './types';

// Playback engine
export {
  PlaybackEngine,
  FadeController,
  Scheduler,
  currentPosition,
  NATURAL_FADE,
  HALT_FADE,
} from './playback';

// Playlist
export {
  Playlist,
  VOLUME_PRESETS,
  songDuration,
  songFilename,
  songFromRecord,
  songToRecord,
  savePlaylist,
  loadPlaylist,
} from './playlist';

// Utilities
export { Logger, EngineLogger } from './utils/logger';
export type { LogLevel, LoggerConfig } from './utils/logger';
export { EventEmitter } from './utils/events';
export type { EventListener, EventMap } from './utils/events';
export {
  validate,
  validateSafe,
  validateRange,
  validateTimeRange,
  isValidationError,
  isZodError,
} from './utils/validation';
export {
  CueDeckConfigSchema,
  EngineConfigSchema,
  SongRecordSchema,
  PlaylistSchema,
} from './utils/validators';
export {
  formatTime,
  formatDuration,
  toSeconds,
  toTimeComponents,
  clampTimeComponents,
  isValidTimeComponents,
} from './utils/time';
export type { TimeComponents } from './utils/time';
