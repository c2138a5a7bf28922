/**
 * Main CueDeckClient class
 *
 * Ties a playlist to the playback engine the way a show operator uses it:
 * - Preview: audition any segment of a loaded file
 * - Playlist playback: each song plays once and fades out at its end time,
 *   then the deck waits for the next AdvanceSong command
 * - Halt: fade the current song out early
 * - Playlist persistence as JSON
 */

import type { CueDeckConfig, CueDeckEvents, EngineState, NowPlaying } from './types';
import { ValidationError } from './types';
import { CueDeckConfigSchema } from './utils/validators';
import { validate, validateTimeRange } from './utils/validation';
import { EventEmitter } from './utils/events';
import type { EventListener } from './utils/events';
import { EngineLogger } from './utils/logger';
import { formatTime } from './utils/time';
import { PlaybackEngine } from './playback/PlaybackEngine';
import { Playlist, songDuration, songFilename } from './playlist/Playlist';
import { loadPlaylist, savePlaylist } from './playlist/PlaylistStore';

const logger = EngineLogger.child('Client');

export interface CueDeckState {
  engine: Readonly<EngineState>;
  playlist: {
    currentIndex: number;
    length: number;
  };
}

export class CueDeckClient {
  /**
   * Playback engine driving the audio backend
   * Access directly for preview and transport control without a playlist
   *
   * @example
   * ```typescript
   * deck.engine.load('/music/overture.wav')
   * deck.engine.playPreview(12.5, 30)
   * deck.engine.pausePreview()
   * ```
   */
  public readonly engine: PlaybackEngine;

  private events = new EventEmitter<CueDeckEvents>();
  private currentPlaylist = new Playlist();

  constructor(config: CueDeckConfig) {
    const validatedConfig = validate(CueDeckConfigSchema, config, 'CueDeckConfig');
    const debug = validatedConfig.debug ?? false;

    EngineLogger.configure({
      enabled: debug,
      level: validatedConfig.logLevel ?? (debug ? 'debug' : 'info'),
    });

    this.engine = new PlaybackEngine(
      validatedConfig.backend,
      {
        onPosition: (seconds) => this.events.emit('position', seconds),
        onSongFinished: () => this.handleSongFinished(),
        onHaltCompleted: () => this.handleHaltCompleted(),
      },
      validatedConfig.engine
    );

    logger.info('Initialized', { debug });
  }

  // ============================================================================
  // Events
  // ============================================================================

  on<K extends keyof CueDeckEvents>(event: K, listener: EventListener<CueDeckEvents[K]>): this {
    this.events.on(event, listener);
    return this;
  }

  once<K extends keyof CueDeckEvents>(event: K, listener: EventListener<CueDeckEvents[K]>): this {
    this.events.once(event, listener);
    return this;
  }

  off<K extends keyof CueDeckEvents>(event: K, listener: EventListener<CueDeckEvents[K]>): this {
    this.events.off(event, listener);
    return this;
  }

  // ============================================================================
  // Playlist
  // ============================================================================

  get playlist(): Playlist {
    return this.currentPlaylist;
  }

  setPlaylist(playlist: Playlist): void {
    this.currentPlaylist = playlist;
  }

  async loadPlaylist(filePath: string): Promise<Playlist> {
    this.currentPlaylist = await loadPlaylist(filePath);
    return this.currentPlaylist;
  }

  async savePlaylist(filePath: string): Promise<void> {
    if (this.currentPlaylist.length === 0) {
      throw new ValidationError('Playlist is empty', undefined, { filePath });
    }
    await savePlaylist(this.currentPlaylist, filePath);
  }

  // ============================================================================
  // Preview
  // ============================================================================

  loadPreview(filePath: string): void {
    this.engine.load(filePath);
  }

  /**
   * @throws InvalidRangeError when end <= start
   */
  playPreview(start: number, end: number, resume = false): void {
    validateTimeRange(start, end);
    this.engine.playPreview(start, end, resume);
  }

  pausePreview(): void {
    this.engine.pausePreview();
  }

  stopPreview(): void {
    this.engine.stopPreview();
  }

  // ============================================================================
  // Playlist Playback
  // ============================================================================

  /**
   * Start the playlist from its first song
   *
   * @throws ValidationError if the playlist is empty
   */
  playPlaylist(): void {
    if (this.currentPlaylist.length === 0) {
      throw new ValidationError('Playlist is empty');
    }

    this.currentPlaylist.setCurrentIndex(0);
    this.playCurrentSong();
  }

  /**
   * Load and play the selected song. A song that cannot be played is
   * reported through the `error` event and skipped.
   */
  playCurrentSong(): void {
    const song = this.currentPlaylist.currentSong;
    if (!song) return;

    try {
      validateTimeRange(song.startTime, song.endTime);
      this.engine.load(song.filePath);
      this.engine.playSong(song);
    } catch (error) {
      logger.error('Could not play song', { filePath: song.filePath, error });
      this.events.emit('error', {
        error: error instanceof Error ? error : new Error(String(error)),
        song,
      });
      this.advanceSong();
      return;
    }

    const nowPlaying = this.nowPlaying();
    if (nowPlaying) {
      logger.info(
        `Playing: ${songFilename(song)} (${nowPlaying.index + 1}/${nowPlaying.total}) ` +
          `for ${formatTime(songDuration(song), true)} - waiting for AdvanceSong`
      );
      this.events.emit('songchange', nowPlaying);
    }
  }

  /**
   * Move to the next song and play it; the action behind the AdvanceSong command
   */
  advanceSong(): void {
    const next = this.currentPlaylist.advanceToNext();
    if (next) {
      this.playCurrentSong();
      return;
    }

    logger.info('Playlist completed');
    this.events.emit('playlistcomplete', { total: this.currentPlaylist.length });
  }

  haltMusic(): void {
    this.engine.haltMusic();
  }

  stopPlaylist(): void {
    this.engine.stopPlayback();
    this.currentPlaylist.setCurrentIndex(-1);

    logger.info('Playlist stopped');
    this.events.emit('playliststop', null);
  }

  // ============================================================================
  // State
  // ============================================================================

  getState(): CueDeckState {
    return {
      engine: this.engine.getState(),
      playlist: {
        currentIndex: this.currentPlaylist.currentIndex,
        length: this.currentPlaylist.length,
      },
    };
  }

  /**
   * Clean up resources
   */
  destroy(): void {
    this.engine.destroy();
    this.events.removeAllListeners();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private nowPlaying(): NowPlaying | null {
    const song = this.currentPlaylist.currentSong;
    if (!song) return null;

    return {
      song,
      index: this.currentPlaylist.currentIndex,
      total: this.currentPlaylist.length,
    };
  }

  private handleSongFinished(): void {
    const nowPlaying = this.nowPlaying();
    if (nowPlaying) {
      logger.info(
        `Song finished: ${songFilename(nowPlaying.song)} ` +
          `(${nowPlaying.index + 1}/${nowPlaying.total}) - waiting for AdvanceSong`
      );
    }
    this.events.emit('songfinished', nowPlaying);
  }

  private handleHaltCompleted(): void {
    const nowPlaying = this.nowPlaying();
    logger.info('Halt completed', { index: nowPlaying?.index });
    this.events.emit('haltcompleted', nowPlaying);
  }
}
