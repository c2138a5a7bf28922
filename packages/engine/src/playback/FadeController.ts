/**
 * FadeController - stepped volume ramps to silence
 *
 * Two kinds of fade share one primitive: a FadeSequence advanced one step at
 * a time through the scheduler's `fadeStep` slot.
 * - natural: song reaching its end time (20 steps over 0.5s by default)
 * - halt: operator-requested stop (40 steps over 1.0s by default), starting
 *   from whatever volume the device is at, and reporting completion
 *
 * Only one sequence is live at a time. Starting a fade cancels the previous one.
 */

import type { FadeKind, FadeProfile, FadeSequence } from '../types';
import { EngineLogger } from '../utils/logger';
import type { Scheduler } from './Scheduler';

const logger = EngineLogger.child('FadeController');

export const NATURAL_FADE: FadeProfile = { steps: 20, durationMs: 500 };
export const HALT_FADE: FadeProfile = { steps: 40, durationMs: 1000 };

export interface FadeControllerOptions {
  scheduler: Scheduler;
  /** Device volume writer; must not throw */
  setVolume: (volume: number) => void;
  naturalFade?: FadeProfile;
  haltFade?: FadeProfile;
}

export class FadeController {
  private scheduler: Scheduler;
  private setVolume: (volume: number) => void;
  private profiles: Record<FadeKind, FadeProfile>;
  private active: FadeSequence | null = null;
  private nextId = 0;

  constructor(options: FadeControllerOptions) {
    this.scheduler = options.scheduler;
    this.setVolume = options.setVolume;
    this.profiles = {
      natural: options.naturalFade ?? NATURAL_FADE,
      halt: options.haltFade ?? HALT_FADE,
    };
  }

  /**
   * Ramp from the song's base volume to 0. No completion notice: the song-end
   * timer owns what happens next.
   */
  startNaturalFadeOut(baseVolume: number): void {
    this.start('natural', baseVolume);
  }

  /**
   * Ramp from the current device volume to 0, then call `onComplete` once
   */
  startHaltFadeOut(currentVolume: number, onComplete: () => void): void {
    this.start('halt', currentVolume, onComplete);
  }

  /**
   * Invalidate the live sequence and clear its step timer. Idempotent.
   */
  cancelAll(): void {
    this.scheduler.cancel('fadeStep');

    if (this.active) {
      this.active.cancelled = true;
      logger.debug('Fade cancelled', {
        id: this.active.id,
        kind: this.active.kind,
        stepsTaken: this.active.stepsTaken,
        volume: this.active.currentVolume,
      });
      this.active = null;
    }
  }

  isActive(): boolean {
    return this.active !== null;
  }

  activeKind(): FadeKind | null {
    return this.active?.kind ?? null;
  }

  getActive(): Readonly<FadeSequence> | null {
    return this.active ? { ...this.active } : null;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private start(kind: FadeKind, startVolume: number, onComplete?: () => void): void {
    this.cancelAll();

    const profile = this.profiles[kind];
    const volume = Math.max(0, Math.min(1, startVolume));
    const sequence: FadeSequence = {
      id: ++this.nextId,
      kind,
      stepCount: profile.steps,
      durationMs: profile.durationMs,
      startVolume: volume,
      currentVolume: volume,
      stepsTaken: 0,
      cancelled: false,
    };
    this.active = sequence;

    logger.debug('Fade started', { id: sequence.id, kind, startVolume: volume });

    this.step(sequence, onComplete);
  }

  private step(sequence: FadeSequence, onComplete?: () => void): void {
    if (sequence.cancelled || this.active !== sequence) {
      return;
    }

    // Recomputed from what is left, so the ramp stays linear and lands on 0
    // after exactly stepCount steps
    const remaining = sequence.stepCount - sequence.stepsTaken;
    const next =
      remaining <= 1
        ? 0
        : Math.max(
            0,
            Math.min(
              sequence.startVolume,
              sequence.currentVolume - sequence.currentVolume / remaining
            )
          );

    sequence.stepsTaken++;
    sequence.currentVolume = next;
    this.setVolume(next);

    if (next <= 0) {
      this.active = null;
      logger.debug('Fade complete', { id: sequence.id, kind: sequence.kind });
      onComplete?.();
      return;
    }

    this.scheduler.schedule('fadeStep', sequence.durationMs / sequence.stepCount, () =>
      this.step(sequence, onComplete)
    );
  }
}
