/**
 * One-shot command sender for the TCP command channel
 */

import { connect } from 'node:net';
import type { SendOptions } from '../types/index.js';
import { DEFAULT_REMOTE_HOST, DEFAULT_REMOTE_PORT } from '../config.js';
import { logCommandSent, logError } from '../utils/logger.js';

const DEFAULT_TIMEOUT_MS = 2000;

/**
 * Connect, write `command` and close
 *
 * @returns false when the listener could not be reached; the failure is logged
 */
export function sendCommand(command: string, options: SendOptions = {}): Promise<boolean> {
  const host = options.host ?? DEFAULT_REMOTE_HOST;
  const port = options.port ?? DEFAULT_REMOTE_PORT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolve) => {
    const socket = connect({ host, port });
    socket.setTimeout(timeoutMs);

    socket.once('connect', () => {
      socket.end(`${command}\n`, () => {
        socket.setTimeout(0);
        logCommandSent(command, host, port);
        resolve(true);
      });
    });

    socket.once('timeout', () => {
      socket.destroy(new Error(`Timed out after ${timeoutMs}ms`));
    });

    socket.once('error', (error) => {
      logError(error, { command, host, port });
      resolve(false);
    });
  });
}
