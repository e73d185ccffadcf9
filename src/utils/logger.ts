/**
 * Logging
 *
 * Minimal logger interface shared by every component, plus a console-backed
 * implementation with level filtering. Components accept a `Logger` so tests
 * can pass {@link silentLogger} or a jest fake.
 *
 * @module utils/logger
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Minimal logger interface for components.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  /** Component name shown before each message */
  prefix?: string;
  /** Write everything to stderr, keeping stdout for results */
  stderr?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a console logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', prefix: 'embedding' });
 * logger.info('Embedded %d texts', 12);
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? 'info'];
  const tag = options.prefix ? chalk.cyan(`[${options.prefix}] `) : '';
  const out = options.stderr ? console.error : console.log;

  const enabled = (level: LogLevel): boolean => LOG_LEVELS[level] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) {
        out(chalk.dim(`[DEBUG] ${tag}${message}`), ...args);
      }
    },
    info(message, ...args) {
      if (enabled('info')) {
        out(`${tag}${message}`, ...args);
      }
    },
    warn(message, ...args) {
      if (enabled('warn')) {
        console.warn(chalk.yellow(`[WARN] ${tag}${message}`), ...args);
      }
    },
    error(message, ...args) {
      if (enabled('error')) {
        console.error(chalk.red(`[ERROR] ${tag}${message}`), ...args);
      }
    },
  };
}

/**
 * Derive a logger for a sub-component that shares the parent's sink.
 */
export function childLogger(parent: Logger, prefix: string): Logger {
  return {
    debug: (message, ...args) => parent.debug(`[${prefix}] ${message}`, ...args),
    info: (message, ...args) => parent.info(`[${prefix}] ${message}`, ...args),
    warn: (message, ...args) => parent.warn(`[${prefix}] ${message}`, ...args),
    error: (message, ...args) => parent.error(`[${prefix}] ${message}`, ...args),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
