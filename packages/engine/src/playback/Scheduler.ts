/**
 * Scheduler - one-shot timers in named slots
 *
 * Each slot holds at most one pending timer. Arming a slot replaces whatever
 * was pending in it. Every timer carries the token it was armed with and only
 * runs while that token is still current, so a callback can never act on a
 * slot that was cancelled or re-armed after it was queued.
 */

import type { ScheduleSlot } from '../types';
import { EngineLogger } from '../utils/logger';

const logger = EngineLogger.child('Scheduler');

interface PendingTimer {
  token: number;
  handle: ReturnType<typeof setTimeout>;
}

export class Scheduler<Slot extends string = ScheduleSlot> {
  private slots = new Map<Slot, PendingTimer>();
  private nextToken = 0;

  /**
   * Arm `slot` to run `callback` after `delayMs`, cancelling any pending timer in it
   */
  schedule(slot: Slot, delayMs: number, callback: () => void): void {
    this.cancel(slot);

    const token = ++this.nextToken;
    const handle = setTimeout(() => this.fire(slot, token, callback), Math.max(0, delayMs));
    this.slots.set(slot, { token, handle });
  }

  /**
   * Cancel the timer in `slot`. Safe for slots that already fired or never existed.
   */
  cancel(slot: Slot): void {
    const pending = this.slots.get(slot);
    if (!pending) return;

    clearTimeout(pending.handle);
    this.slots.delete(slot);
  }

  cancelAll(): void {
    for (const pending of this.slots.values()) {
      clearTimeout(pending.handle);
    }
    this.slots.clear();
  }

  isPending(slot: Slot): boolean {
    return this.slots.has(slot);
  }

  pendingSlots(): Slot[] {
    return Array.from(this.slots.keys());
  }

  pendingCount(): number {
    return this.slots.size;
  }

  private fire(slot: Slot, token: number, callback: () => void): void {
    if (this.slots.get(slot)?.token !== token) {
      logger.debug('Dropped stale timer', { slot, token });
      return;
    }

    // Cleared before running so the callback may re-arm its own slot
    this.slots.delete(slot);

    try {
      callback();
    } catch (error) {
      logger.error('Timer callback failed', { slot, error });
    }
  }
}
