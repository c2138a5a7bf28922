/**
 * TCP command listener
 *
 * Accepts short-lived connections carrying UTF-8 command strings, one per
 * line or one per connection, and dispatches each to its registered handler.
 */

import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import type { CommandHandler, ListenerAddress, ListenerOptions } from '../types/index.js';
import {
  logCommandReceived,
  logError,
  logListenerStarted,
  logListenerStopped,
  logUnknownCommand,
} from '../utils/logger.js';

/** Longest pending input per connection, in characters */
export const MAX_COMMAND_LENGTH = 1024;

export class CommandListener {
  private handlers = new Map<string, CommandHandler>();
  private sockets = new Set<Socket>();
  private server: Server | null = null;
  private boundAddress: ListenerAddress | null = null;

  constructor(private readonly options: ListenerOptions) {}

  register(command: string, handler: CommandHandler): this {
    this.handlers.set(command, handler);
    return this;
  }

  unregister(command: string): boolean {
    return this.handlers.delete(command);
  }

  get commands(): string[] {
    return Array.from(this.handlers.keys());
  }

  isListening(): boolean {
    return this.server !== null;
  }

  address(): ListenerAddress | null {
    return this.boundAddress;
  }

  /**
   * Bind and start accepting connections
   *
   * @returns The bound address; the port is the real one when 0 was requested
   */
  start(): Promise<ListenerAddress> {
    if (this.server) {
      return Promise.reject(new Error('Command listener is already running'));
    }

    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.handleConnection(socket));

      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        server.on('error', (error) => logError(error, { source: 'command-listener' }));
        this.server = server;

        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.options.port;

        this.boundAddress = { host: this.options.host, port };

        logListenerStarted(this.options.host, port);
        resolve(this.boundAddress);
      });
    });
  }

  /**
   * Stop accepting connections and drop any still open
   */
  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    this.boundAddress = null;

    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logListenerStopped(this.options.host);
        resolve();
      });
    });
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private handleConnection(socket: Socket): void {
    const remoteAddress = socket.remoteAddress;
    let buffer = '';

    this.sockets.add(socket);
    socket.setEncoding('utf-8');

    socket.on('data', (chunk: string) => {
      buffer += chunk;

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        this.dispatch(buffer.slice(0, newline), remoteAddress);
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
      }

      if (buffer.length > MAX_COMMAND_LENGTH) {
        logError(new Error('Command too long'), { remoteAddress, length: buffer.length });
        socket.destroy();
      }
    });

    socket.on('end', () => {
      this.dispatch(buffer, remoteAddress);
      buffer = '';
      socket.end();
    });

    socket.on('error', (error) => logError(error, { source: 'command-connection', remoteAddress }));
    socket.on('close', () => this.sockets.delete(socket));
  }

  private dispatch(raw: string, remoteAddress?: string): void {
    const command = raw.trim();
    if (!command) return;

    const handler = this.handlers.get(command);
    if (!handler) {
      logUnknownCommand(command, remoteAddress);
      return;
    }

    logCommandReceived(command, remoteAddress);
    void this.runHandler(command, handler);
  }

  private async runHandler(command: string, handler: CommandHandler): Promise<void> {
    try {
      await handler(command);
    } catch (error) {
      logError(error, { command });
    }
  }
}
