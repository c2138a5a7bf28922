/**
 * Playlist types
 */

/**
 * A clip of an audio file, as used by the engine
 */
export interface Song {
  filePath: string;
  /** Clip start in seconds */
  startTime: number;
  /** Clip end in seconds; greater than startTime */
  endTime: number;
  /** Page number in the printed cue sheet */
  page: number;
  comment: string;
  /** Playback volume (0-1) */
  volume: number;
}

/**
 * Song as persisted in a playlist file
 */
export interface SongRecord {
  file_path: string;
  start_time: number;
  end_time: number;
  page: number;
  comment: string;
  volume: number;
}

/**
 * Named volume levels for bulk normalization
 */
export type VolumePreset = 'uniform' | 'conservative' | 'quiet';
