/**
 * Playlist - ordered cue list with a current-song cursor
 *
 * The cursor is -1 when nothing is selected. Removing, moving and swapping
 * songs keep the cursor on the same song where possible.
 */

import { basename } from 'node:path';
import type { Song, SongRecord, VolumePreset } from '../types';
import { validate, validateRange } from '../utils/validation';
import { PlaylistSchema } from '../utils/validators';

export const VOLUME_PRESETS: Record<VolumePreset, number> = {
  uniform: 1.0,
  conservative: 0.75,
  quiet: 0.5,
};

export function songDuration(song: Song): number {
  return song.endTime - song.startTime;
}

export function songFilename(song: Song): string {
  return basename(song.filePath);
}

export function songFromRecord(record: SongRecord): Song {
  return {
    filePath: record.file_path,
    startTime: record.start_time,
    endTime: record.end_time,
    page: record.page,
    comment: record.comment,
    volume: record.volume,
  };
}

export function songToRecord(song: Song): SongRecord {
  return {
    file_path: song.filePath,
    start_time: song.startTime,
    end_time: song.endTime,
    page: song.page,
    comment: song.comment,
    volume: song.volume,
  };
}

export class Playlist implements Iterable<Song> {
  private songs: Song[] = [];
  private cursor = -1;

  constructor(songs: Song[] = []) {
    this.songs = [...songs];
  }

  /**
   * Build a playlist from parsed playlist-file JSON
   *
   * @throws ValidationError if any record is malformed
   */
  static fromJSON(data: unknown): Playlist {
    const records = validate(PlaylistSchema, data, 'playlist');
    return new Playlist(records.map(songFromRecord));
  }

  toJSON(): SongRecord[] {
    return this.songs.map(songToRecord);
  }

  get length(): number {
    return this.songs.length;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  get currentSong(): Song | null {
    return this.songs[this.cursor] ?? null;
  }

  get hasNext(): boolean {
    return this.cursor < this.songs.length - 1;
  }

  at(index: number): Song | undefined {
    return this.songs[index];
  }

  toArray(): Song[] {
    return [...this.songs];
  }

  [Symbol.iterator](): Iterator<Song> {
    return this.songs[Symbol.iterator]();
  }

  add(song: Song): void {
    this.songs.push(song);
  }

  remove(index: number): void {
    if (index < 0 || index >= this.songs.length) return;

    this.songs.splice(index, 1);

    if (this.cursor >= index && this.cursor > 0) {
      this.cursor--;
    } else if (this.cursor >= this.songs.length) {
      this.cursor = -1;
    }
  }

  move(from: number, to: number): void {
    if (!this.isIndex(from) || !this.isIndex(to) || from === to) return;

    const [song] = this.songs.splice(from, 1);
    this.songs.splice(to, 0, song);

    if (this.cursor === from) {
      this.cursor = to;
    } else if (from < this.cursor && this.cursor <= to) {
      this.cursor--;
    } else if (to <= this.cursor && this.cursor < from) {
      this.cursor++;
    }
  }

  swap(a: number, b: number): void {
    if (!this.isIndex(a) || !this.isIndex(b)) return;

    [this.songs[a], this.songs[b]] = [this.songs[b], this.songs[a]];

    if (this.cursor === a) {
      this.cursor = b;
    } else if (this.cursor === b) {
      this.cursor = a;
    }
  }

  clear(): void {
    this.songs = [];
    this.cursor = -1;
  }

  /**
   * Select a song by index, or -1 for none. Out-of-range indexes are ignored.
   */
  setCurrentIndex(index: number): void {
    if (index >= -1 && index < this.songs.length) {
      this.cursor = index;
    }
  }

  /**
   * Move the cursor to the next song and return it. Past the last song the
   * cursor resets to -1 and null is returned.
   */
  advanceToNext(): Song | null {
    if (this.hasNext) {
      this.cursor++;
      return this.currentSong;
    }

    this.cursor = -1;
    return null;
  }

  /**
   * @throws ValidationError for a volume outside 0-1
   */
  setVolume(index: number, volume: number): void {
    const song = this.songs[index];
    if (!song) return;

    this.songs[index] = { ...song, volume: validateRange(volume, 0, 1, 'Volume') };
  }

  /**
   * Set every song to a preset level or a custom 0-1 level
   */
  normalizeVolumes(level: VolumePreset | number): void {
    const volume =
      typeof level === 'number' ? validateRange(level, 0, 1, 'Volume') : VOLUME_PRESETS[level];

    this.songs = this.songs.map((song) => ({ ...song, volume }));
  }

  private isIndex(index: number): boolean {
    return index >= 0 && index < this.songs.length;
  }
}
