/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data dir)
 * - Consistent exit codes
 * - Output utilities (info, warn, error, JSON)
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Config } from '../config/index.js';
import { resolveDataDir } from '../storage/paths.js';
import { createLogger, type Logger, type LogLevel } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error, including configuration errors */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Every external call of a stage failed; no rankings produced */
  API_ERROR: 4,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Output and option helpers shared by command handlers. Results go to
 * stdout; diagnostics from the pipeline logger go to stderr.
 */
export class BaseCommand {
  readonly options: GlobalOptions;

  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  /**
   * Data directory: `--data-dir`, else the configured one.
   */
  dataDir(config: Config): string {
    return resolveDataDir(this.options.dataDir ?? config.dataDir);
  }

  /**
   * Pipeline logger honoring --verbose and --quiet over LOG_LEVEL.
   */
  createLogger(config: Config): Logger {
    let level: LogLevel = config.logLevel;
    if (this.options.verbose) {
      level = 'debug';
    } else if (this.options.quiet) {
      level = 'error';
    }
    return createLogger({ level, stderr: true });
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message, with the stack in verbose mode.
   */
  error(message: string, error?: unknown): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error instanceof Error && this.options.verbose) {
      console.error(chalk.dim(error.stack ?? error.message));
    }
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print data as formatted JSON (shown even in quiet mode).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 */
export function getBaseCommand(cmd: { optsWithGlobals(): Record<string, unknown> }): BaseCommand {
  const base = cmd.optsWithGlobals()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    // Commands run outside the program (tests) get defaults.
    return new BaseCommand({});
  }
  return base;
}
