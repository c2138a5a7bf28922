/**
 * Event emitter utility
 *
 * Generic type-safe event emitter. Listener errors are logged and never
 * propagate back into the emitter, so a failing subscriber cannot break
 * playback state.
 */

import { EngineLogger } from './logger';

const logger = EngineLogger.child('Events');

export type EventListener<T = unknown> = (data: T) => void;

export type EventMap = Record<string, unknown>;

/**
 * Type-safe event emitter
 */
export class EventEmitter<Events extends EventMap = EventMap> {
  private eventListeners = new Map<keyof Events, Set<EventListener<never>>>();
  private maxListeners: number;

  constructor(options?: { maxListeners?: number }) {
    this.maxListeners = options?.maxListeners ?? 10;
  }

  /**
   * Add event listener
   */
  on<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): this {
    let listeners = this.eventListeners.get(event);
    if (!listeners) {
      listeners = new Set();
      this.eventListeners.set(event, listeners);
    }

    listeners.add(listener);

    if (listeners.size > this.maxListeners) {
      logger.warn('Possible listener leak detected', {
        event: String(event),
        listenerCount: listeners.size,
        maxListeners: this.maxListeners,
      });
    }

    return this;
  }

  /**
   * Add one-time event listener
   */
  once<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): this {
    const onceListener: EventListener<Events[K]> = (data) => {
      this.off(event, onceListener);
      listener(data);
    };

    return this.on(event, onceListener);
  }

  /**
   * Remove event listener
   */
  off<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): this {
    const listeners = this.eventListeners.get(event);
    if (listeners) {
      listeners.delete(listener);

      if (listeners.size === 0) {
        this.eventListeners.delete(event);
      }
    }

    return this;
  }

  /**
   * Remove all listeners for an event, or for every event
   */
  removeAllListeners<K extends keyof Events>(event?: K): this {
    if (event !== undefined) {
      this.eventListeners.delete(event);
    } else {
      this.eventListeners.clear();
    }

    return this;
  }

  /**
   * Emit event. Returns false when nobody is listening.
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): boolean {
    const listeners = this.eventListeners.get(event);
    if (!listeners || listeners.size === 0) {
      return false;
    }

    // Copy so once-listeners can unsubscribe mid-iteration
    Array.from(listeners).forEach((listener) => {
      try {
        (listener as EventListener<Events[K]>)(data);
      } catch (error) {
        logger.error('Error in listener', { event: String(event), error });
      }
    });

    return true;
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.eventListeners.get(event)?.size ?? 0;
  }

  eventNames(): (keyof Events)[] {
    return Array.from(this.eventListeners.keys());
  }
}
