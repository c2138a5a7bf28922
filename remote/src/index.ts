/**
 * @cuedeck/remote
 *
 * Network command channel for a CueDeck controller
 *
 * @packageDocumentation
 */

import type { CueDeckClient } from '@cuedeck/engine';
import type { RemoteConfig } from './types/index.js';
import { loadRemoteConfig } from './config.js';
import { ADVANCE_SONG_COMMAND, createAdvanceSongHandler } from './handlers/advance-song.js';
import { CommandListener } from './services/command-listener.js';
import { logger } from './utils/logger.js';

/**
 * Start listening for remote commands on behalf of `controller`
 *
 * @example
 * ```typescript
 * const listener = await startRemote(deck)
 * // elsewhere: await sendCommand('AdvanceSong', { port: 5556 })
 * await listener.stop()
 * ```
 */
export async function startRemote(
  controller: Pick<CueDeckClient, 'advanceSong'>,
  config: RemoteConfig = loadRemoteConfig()
): Promise<CommandListener> {
  logger.level = config.logLevel;

  const listener = new CommandListener({ host: config.host, port: config.port });
  listener.register(ADVANCE_SONG_COMMAND, createAdvanceSongHandler(controller));

  await listener.start();
  return listener;
}

export { CommandListener, MAX_COMMAND_LENGTH } from './services/command-listener.js';
export { sendCommand } from './services/command-sender.js';
export { ADVANCE_SONG_COMMAND, createAdvanceSongHandler } from './handlers/advance-song.js';
export {
  loadRemoteConfig,
  RemoteEnvSchema,
  DEFAULT_REMOTE_HOST,
  DEFAULT_REMOTE_PORT,
} from './config.js';
export { logger, createLogger } from './utils/logger.js';
export type {
  CommandHandler,
  ListenerAddress,
  ListenerOptions,
  RemoteConfig,
  SendOptions,
} from './types/index.js';
