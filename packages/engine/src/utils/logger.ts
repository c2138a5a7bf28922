/**
 * Debug logging utility
 *
 * Namespaced, level-filtered console logging. Disabled until configured.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  enabled?: boolean;
  level?: LogLevel;
  namespace?: string;
  prefix?: string;
  useColors?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ANSI escape codes
const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\u001b[90m', // gray
  info: '\u001b[34m', // blue
  warn: '\u001b[33m', // yellow
  error: '\u001b[31m', // red
};
const RESET = '\u001b[0m';

export class Logger {
  private config: Required<LoggerConfig>;
  private children: Logger[] = [];

  constructor(config?: LoggerConfig) {
    this.config = {
      enabled: config?.enabled ?? false,
      level: config?.level ?? 'info',
      namespace: config?.namespace ?? 'Engine',
      prefix: config?.prefix ?? '[CueDeck]',
      useColors: config?.useColors ?? Boolean(process.stdout.isTTY),
    };
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Create a child logger with a sub-namespace
   */
  child(namespace: string): Logger {
    const childLogger = new Logger({
      ...this.config,
      namespace: `${this.config.namespace}:${namespace}`,
    });
    this.children.push(childLogger);
    return childLogger;
  }

  /**
   * Configure logger (propagates to children)
   */
  configure(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
    this.children.forEach((child) => {
      child.configure({
        ...config,
        namespace: child.config.namespace, // Preserve child namespace
      });
    });
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.config.enabled) return;
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) return;

    const prefix = `${this.config.prefix} [${new Date().toISOString()}] [${this.config.namespace}]`;
    const consoleMethod = level === 'debug' ? 'log' : level;
    const label = this.config.useColors ? `${LOG_COLORS[level]}${prefix}${RESET}` : prefix;

    console[consoleMethod](label, message, data !== undefined ? data : '');
  }
}

/**
 * Package-wide logger singleton.
 * Configured by CueDeckClient, used through child loggers everywhere else.
 */
export const EngineLogger = new Logger({
  enabled: false,
  level: 'info',
  namespace: 'Engine',
  prefix: '[CueDeck]',
});
