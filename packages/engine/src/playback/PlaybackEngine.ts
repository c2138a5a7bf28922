/**
 * PlaybackEngine - transport state machine over a single audio device
 *
 * Features:
 * - Preview playback of a clip segment with pause/resume and 10ms position polling
 * - Full-song playback with a natural fade scheduled to end exactly at the clip end
 * - Halt: graceful 1s fade from the current volume, then stop
 * - Every play/stop/halt clears the timers it supersedes before returning
 *
 * Node runs every timer on one event loop, so engine methods and timer
 * callbacks never interleave. What remains is staleness: each callback
 * captures the session it was armed for and does nothing once that session
 * has been replaced or stopped.
 */

import type {
  AudioBackend,
  EngineConfig,
  EngineState,
  FadeProfile,
  PlaybackHooks,
  PlaybackMode,
  PlaybackSession,
  Song,
  TransportStatus,
} from '../types';
import { CueDeckError, LoadFailureError, PlaybackError } from '../types';
import { EngineLogger } from '../utils/logger';
import { validate } from '../utils/validation';
import { EngineConfigSchema } from '../utils/validators';
import { currentPosition } from './clock';
import { FadeController, HALT_FADE, NATURAL_FADE } from './FadeController';
import { Scheduler } from './Scheduler';

const logger = EngineLogger.child('PlaybackEngine');

interface ResolvedEngineConfig {
  naturalFade: FadeProfile;
  haltFade: FadeProfile;
  fadeLeadTime: number;
  positionPollInterval: number;
  debug: boolean;
}

export class PlaybackEngine {
  private backend: AudioBackend;
  private hooks: PlaybackHooks;
  private config: ResolvedEngineConfig;
  private scheduler = new Scheduler();
  private fades: FadeController;
  private session: PlaybackSession | null = null;
  private nextSessionId = 0;

  // Last volume written to the device
  private volume = 1.0;

  constructor(backend: AudioBackend, hooks: PlaybackHooks = {}, config?: EngineConfig) {
    const validated = validate(EngineConfigSchema, config ?? {}, 'EngineConfig');

    this.config = {
      naturalFade: validated.naturalFade ?? NATURAL_FADE,
      haltFade: validated.haltFade ?? HALT_FADE,
      fadeLeadTime: validated.fadeLeadTime ?? 0.5,
      positionPollInterval: validated.positionPollInterval ?? 10,
      debug: validated.debug ?? false,
    };

    if (this.config.debug) {
      EngineLogger.configure({ enabled: true, level: 'debug' });
    }

    this.backend = backend;
    this.hooks = hooks;
    this.fades = new FadeController({
      scheduler: this.scheduler,
      setVolume: (volume) => this.quietly('set volume', () => this.writeVolume(volume)),
      naturalFade: this.config.naturalFade,
      haltFade: this.config.haltFade,
    });

    logger.debug('Initialized', { config: this.config });
  }

  // ============================================================================
  // Loading
  // ============================================================================

  /**
   * Stop whatever is playing (an in-progress halt included, without its
   * completion hook), reset the volume and load a file into the device
   *
   * @throws LoadFailureError if the backend rejects the file
   */
  load(filePath: string): void {
    this.clearTimers();
    this.session = null;

    this.command('stop', () => this.backend.stop());
    this.command('set volume', () => this.writeVolume(1.0));

    try {
      this.backend.load(filePath);
    } catch (error) {
      logger.warn('Load failed', { filePath, error });
      throw new LoadFailureError(`Could not load ${filePath}`, filePath, error);
    }

    logger.debug('Loaded', { filePath });
  }

  // ============================================================================
  // Preview Playback
  // ============================================================================

  /**
   * Play the loaded file from `start` (or from the paused position when
   * `resume` is set and a pause is recorded) until `end`
   */
  playPreview(start: number, end: number, resume = false): void {
    const previous = this.session;
    const pausedAt = resume && previous?.mode === 'preview' ? previous.pausedAt : null;
    const position = pausedAt ?? start;

    this.clearTimers();
    this.session = null;

    this.command('set volume', () => this.writeVolume(1.0));
    this.command('play', () => this.backend.play(position));

    const session = this.createSession('preview', {
      baseVolume: 1.0,
      startPosition: position,
      endPosition: end,
      song: null,
    });
    this.session = session;

    logger.info('Preview started', { position, end, resumed: pausedAt !== null });

    this.pollPosition(session);
  }

  /**
   * Toggle a preview between playing and paused. No-op for full songs or when stopped.
   */
  pausePreview(): void {
    const session = this.session;
    if (!session || session.mode !== 'preview') {
      logger.debug('pausePreview ignored: no preview session');
      return;
    }

    if (session.status === 'playing') {
      const position = currentPosition(session, Date.now());
      this.command('pause', () => this.backend.pause());

      this.scheduler.cancel('positionPoll');
      session.pausedAt = position;
      session.status = 'paused';

      logger.info('Preview paused', { position });
    } else if (session.status === 'paused' && session.pausedAt !== null) {
      this.command('resume', () => this.backend.resume());

      session.accumulatedOffset = session.pausedAt;
      session.startedAt = Date.now();
      session.pausedAt = null;
      session.status = 'playing';

      logger.info('Preview resumed', { position: session.accumulatedOffset });

      this.pollPosition(session);
    }
  }

  /**
   * Stop any playback, reset the device, and report position 0
   */
  stopPreview(): void {
    this.clearTimers();
    this.session = null;

    this.command('stop', () => this.backend.stop());
    this.command('set volume', () => this.writeVolume(1.0));

    logger.info('Preview stopped');

    this.runHook('onPosition', () => this.hooks.onPosition?.(0));
  }

  // ============================================================================
  // Full-Song Playback
  // ============================================================================

  /**
   * Play a clip from its start time at its own volume. A natural fade is
   * scheduled to finish as the clip reaches its end time.
   */
  playSong(song: Song): void {
    this.clearTimers();
    this.session = null;

    const duration = song.endTime - song.startTime;

    this.command('set volume', () => this.writeVolume(song.volume));
    this.command('play', () => this.backend.play(song.startTime));

    const session = this.createSession('song', {
      baseVolume: song.volume,
      startPosition: song.startTime,
      endPosition: null,
      song,
    });
    this.session = session;

    const fadeAt = Math.max(0, duration - this.config.fadeLeadTime);
    this.scheduler.schedule('fadeStart', fadeAt * 1000, () => this.onFadeStart(session));
    this.scheduler.schedule('songEnd', duration * 1000, () => this.onSongEnd(session));

    logger.info('Song started', {
      filePath: song.filePath,
      startTime: song.startTime,
      duration,
      volume: song.volume,
    });
  }

  /**
   * Fade the playing song out from its current volume and stop it.
   * No-op unless a full song is playing; a second call while halting is ignored.
   */
  haltMusic(): void {
    const session = this.session;
    if (!session || session.mode !== 'song' || session.status !== 'playing') {
      logger.debug('haltMusic ignored', { status: this.getStatus() });
      return;
    }

    this.scheduler.cancel('fadeStart');
    this.scheduler.cancel('songEnd');
    this.fades.cancelAll();

    session.status = 'halting';

    logger.info('Halting', { volume: this.volume });

    this.fades.startHaltFadeOut(this.volume, () => this.onHaltComplete(session));
  }

  /**
   * Stop all playback immediately and reset the device volume
   */
  stopPlayback(): void {
    this.clearTimers();
    this.session = null;

    this.command('stop', () => this.backend.stop());
    this.command('set volume', () => this.writeVolume(1.0));

    logger.info('Playback stopped');
  }

  // ============================================================================
  // State
  // ============================================================================

  getStatus(): TransportStatus {
    return this.session?.status ?? 'stopped';
  }

  getCurrentPosition(): number {
    return currentPosition(this.session, Date.now());
  }

  getVolume(): number {
    return this.volume;
  }

  getState(): Readonly<EngineState> {
    const fade = this.fades.getActive();

    return {
      status: this.getStatus(),
      mode: this.session?.mode ?? null,
      volume: this.volume,
      position: this.getCurrentPosition(),
      pausedAt: this.session?.pausedAt ?? null,
      pendingTimers: this.scheduler.pendingSlots(),
      fade: fade
        ? {
            kind: fade.kind,
            volume: fade.currentVolume,
            stepsTaken: fade.stepsTaken,
            stepCount: fade.stepCount,
          }
        : null,
      song: this.session?.song ?? null,
    };
  }

  setHooks(hooks: PlaybackHooks): void {
    this.hooks = hooks;
  }

  /**
   * Cancel every timer and detach hooks. The device is left as it is.
   */
  destroy(): void {
    this.clearTimers();
    this.session = null;
    this.hooks = {};

    logger.debug('Destroyed');
  }

  // ============================================================================
  // Timer Callbacks
  // ============================================================================

  private pollPosition(session: PlaybackSession): void {
    if (this.session !== session || session.status !== 'playing') return;

    if (!this.isDeviceBusy()) {
      logger.debug('Device idle, ending preview');
      this.stopPreview();
      return;
    }

    const position = currentPosition(session, Date.now());
    if (session.endPosition !== null && position >= session.endPosition) {
      logger.debug('Preview reached end', { position, end: session.endPosition });
      this.stopPreview();
      return;
    }

    this.runHook('onPosition', () => this.hooks.onPosition?.(position));

    // The hook may have stopped or replaced this session
    if (this.session !== session || session.status !== 'playing') return;

    this.scheduler.schedule('positionPoll', this.config.positionPollInterval, () =>
      this.pollPosition(session)
    );
  }

  private onFadeStart(session: PlaybackSession): void {
    // Checked here as well as in haltMusic: a halt may land in the same tick
    if (this.session !== session || session.status !== 'playing') {
      logger.debug('Natural fade skipped', { status: session.status });
      return;
    }

    this.fades.startNaturalFadeOut(session.baseVolume);
  }

  private onSongEnd(session: PlaybackSession): void {
    if (this.session !== session || session.status === 'halting') return;

    this.clearTimers();
    this.session = null;

    this.quietly('stop', () => this.backend.stop());
    this.quietly('set volume', () => this.writeVolume(1.0));

    logger.info('Song finished', { filePath: session.song?.filePath });

    this.runHook('onSongFinished', () => this.hooks.onSongFinished?.());
  }

  private onHaltComplete(session: PlaybackSession): void {
    if (this.session !== session) return;

    this.clearTimers();
    this.session = null;

    this.quietly('stop', () => this.backend.stop());
    // Restore full volume so the next play call is not silently muted
    this.quietly('set volume', () => this.writeVolume(1.0));

    logger.info('Halt complete', { filePath: session.song?.filePath });

    this.runHook('onHaltCompleted', () => this.hooks.onHaltCompleted?.());
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private createSession(
    mode: PlaybackMode,
    options: Pick<PlaybackSession, 'baseVolume' | 'startPosition' | 'endPosition' | 'song'>
  ): PlaybackSession {
    return {
      id: ++this.nextSessionId,
      mode,
      ...options,
      startedAt: Date.now(),
      accumulatedOffset: options.startPosition,
      pausedAt: null,
      status: 'playing',
    };
  }

  private clearTimers(): void {
    this.fades.cancelAll();
    this.scheduler.cancelAll();
  }

  private writeVolume(volume: number): void {
    this.volume = volume;
    this.backend.setVolume(volume);
  }

  /**
   * Run a device command on behalf of a caller; failures surface synchronously
   */
  private command(action: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logger.warn(`Device failed to ${action}`, error);
      if (error instanceof CueDeckError) throw error;
      throw new PlaybackError(`Audio device failed to ${action}`, error, { action });
    }
  }

  /**
   * Run a device command from a timer, where there is no caller to report to
   */
  private quietly(action: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logger.warn(`Device failed to ${action}`, error);
    }
  }

  private isDeviceBusy(): boolean {
    try {
      return this.backend.isBusy();
    } catch (error) {
      logger.warn('Device failed to report busy state', error);
      return false;
    }
  }

  private runHook(name: keyof PlaybackHooks, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      logger.error(`Error in ${name} hook`, error);
    }
  }
}
