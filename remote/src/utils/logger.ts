/**
 * Structured Logger Utility
 * Uses Pino for structured logging of remote commands
 */

import pino from 'pino';

/**
 * Create logger instance; pretty output for interactive runs, JSON otherwise
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test'
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      }),
});

/**
 * Create child logger with additional context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function logListenerStarted(host: string, port: number) {
  logger.info(
    {
      type: 'listener_started',
      host,
      port,
    },
    `Listening for commands on ${host}:${port}`
  );
}

export function logListenerStopped(host: string) {
  logger.info({ type: 'listener_stopped', host }, 'Command listener stopped');
}

export function logCommandReceived(command: string, remoteAddress?: string) {
  logger.info(
    {
      type: 'command_received',
      command,
      remoteAddress,
    },
    `Command received: ${command}`
  );
}

export function logUnknownCommand(command: string, remoteAddress?: string) {
  logger.warn(
    {
      type: 'unknown_command',
      command,
      remoteAddress,
    },
    `Unknown command: ${command}`
  );
}

export function logCommandSent(command: string, host: string, port: number) {
  logger.debug(
    {
      type: 'command_sent',
      command,
      host,
      port,
    },
    `Sent ${command} to ${host}:${port}`
  );
}

/**
 * Log errors with context
 */
export function logError(error: unknown, context?: Record<string, unknown>) {
  logger.error(
    {
      type: 'error',
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...context,
    },
    'Error occurred'
  );
}
