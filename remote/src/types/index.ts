/**
 * Type definitions for the CueDeck remote command channel
 */

import type { LevelWithSilent } from 'pino';

/**
 * Runs when its command arrives. Errors and rejections are logged, never
 * sent back to the sender.
 */
export type CommandHandler = (command: string) => void | Promise<void>;

export interface ListenerOptions {
  host: string;
  /** 0 binds an ephemeral port */
  port: number;
}

export interface ListenerAddress {
  host: string;
  port: number;
}

export interface SendOptions {
  host?: string;
  port?: number;
  timeoutMs?: number;
}

export interface RemoteConfig {
  host: string;
  port: number;
  logLevel: LevelWithSilent;
}
