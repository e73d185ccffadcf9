/**
 * Shared Command Plumbing
 *
 * Runtime construction, Ctrl-C cancellation, option parsers and the
 * mapping from outcomes to exit codes used by every command.
 *
 * @module cli/commands/shared
 */

import { InvalidArgumentError } from 'commander';
import { loadConfig, type Config } from '../../config/index.js';
import { ConfigError, RateLimitMisconfiguredError, VendorDiscoveryError } from '../../errors/index.js';
import type { RunResult } from '../../pipeline/types.js';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import type { Runtime, RuntimeFactory } from '../runtime.js';

/**
 * What commands need from outside the process.
 */
export interface CommandContext {
  env: NodeJS.ProcessEnv;
  createRuntime: RuntimeFactory;
}

/**
 * Commander parser for positive integer option values.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Exit code for an error thrown by a command handler.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError || error instanceof RateLimitMisconfiguredError) {
    return EXIT_CODES.ERROR;
  }
  if (error instanceof VendorDiscoveryError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Exit code for a finished run. `produced` says whether the run yielded
 * anything; a run that yielded nothing because calls failed is an API error.
 */
export function exitCodeForResult(result: RunResult, produced: boolean): ExitCode {
  if (result.cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  if (!produced && result.failures.length > 0) {
    return EXIT_CODES.API_ERROR;
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Load configuration, build the runtime, and hand both to `fn`. The runtime
 * is closed afterwards; errors are reported and mapped to an exit code.
 */
export async function withRuntime(
  base: BaseCommand,
  context: CommandContext,
  fn: (runtime: Runtime, config: Config, dataDir: string) => Promise<ExitCode>
): Promise<ExitCode> {
  try {
    const config = loadConfig(context.env);
    const dataDir = base.dataDir(config);
    const runtime = await context.createRuntime(config, dataDir, base.createLogger(config));
    try {
      return await fn(runtime, config, dataDir);
    } finally {
      await runtime.close();
    }
  } catch (error) {
    base.error(error instanceof Error ? error.message : String(error), error);
    return exitCodeForError(error);
  }
}

/**
 * Run `fn` with a signal that aborts on the first SIGINT.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
