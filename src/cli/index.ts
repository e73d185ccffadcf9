/**
 * Event Vendor Discovery CLI
 *
 * Usage:
 *   vendors --help
 *   vendors plan "birthday party for 30 kids with balloon decoration"
 *   vendors plan -c "balloon decoration" "cake shop" --top-k 5 kids party
 *   vendors collect --details
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import { createRuntime, type RuntimeFactory } from './runtime.js';
import { getVersionInfo, VERSION } from './version.js';

// ============================================================================
// Main Program Setup
// ============================================================================

export interface ProgramOptions {
  /** Environment read by config (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Runtime builder (default: real API clients and LanceDB) */
  createRuntime?: RuntimeFactory;
}

/**
 * Create and configure the main CLI program. Commander errors are thrown
 * as CommanderError instead of exiting the process.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('vendors')
    .description('Event Vendor Discovery - find and rank local vendors for an event')
    .version(VERSION, '-V, --version', 'Display version number')
    .addHelpText('beforeAll', `${getVersionInfo()}\n`);

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.event-vendors)');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();
    const globals: GlobalOptions = {
      verbose: opts['verbose'] === true,
      quiet: opts['quiet'] === true,
      color: opts['color'] !== false,
      dataDir: typeof opts['dataDir'] === 'string' ? opts['dataDir'] : undefined,
    };

    if (globals.verbose && globals.quiet) {
      thisCommand.error('Error: Cannot use both --verbose and --quiet flags', {
        exitCode: EXIT_CODES.USAGE_ERROR,
      });
    }

    // Subcommands read it back through optsWithGlobals()
    thisCommand.setOptionValue('_baseCommand', new BaseCommand(globals));
  });

  // Set before registering so subcommands inherit it.
  program.exitOverride();

  registerCommands(program, {
    env: options.env ?? process.env,
    createRuntime: options.createRuntime ?? createRuntime,
  });

  return program;
}

/**
 * Main CLI entry point. Sets process.exitCode rather than exiting so
 * pending output is flushed.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or the usage error.
      process.exitCode = error.exitCode;
      return;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERROR;
  }
}
