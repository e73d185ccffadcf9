/**
 * Plan Command
 *
 * Discovers vendors for an event description, stores their embeddings and
 * prints the best matches per vendor category.
 *
 * @module cli/commands/plan
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { saveRunResult } from '../../storage/runs.js';
import { resolveLocation } from '../../vendors/location.js';
import { getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatRunSummary } from '../formatters/run-summary.js';
import {
  exitCodeForResult,
  parsePositiveInt,
  withInterrupt,
  withRuntime,
  type CommandContext,
} from './shared.js';

// ============================================================================
// Types
// ============================================================================

export interface PlanOptions {
  location?: string;
  category?: string[];
  topK?: number;
  details?: boolean;
  /** Rank against every stored vendor */
  allVendors?: boolean;
  json?: boolean;
  /** commander inverts --no-save */
  save?: boolean;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle `vendors plan`.
 *
 * @returns 0 on success, 2 for an empty description, 4 when every ranking
 * failed, 130 when interrupted
 */
export async function handlePlan(
  words: readonly string[],
  options: PlanOptions,
  base: BaseCommand,
  context: CommandContext,
  signal?: AbortSignal
): Promise<ExitCode> {
  const eventDescription = words.join(' ');

  return withRuntime(base, context, async (runtime, _config, dataDir) => {
    const result = await runtime.pipeline.run({
      eventDescription,
      location: resolveLocation(options.location),
      categories: options.category,
      topK: options.topK,
      fetchDetails: options.details === true,
      corpus: options.allVendors ? 'all' : 'discovered',
      signal,
    });

    if (options.json) {
      base.json(result);
    } else {
      base.info(formatRunSummary(result));
    }

    if (options.save !== false) {
      const filePath = await saveRunResult(dataDir, result);
      if (!options.json) {
        base.info(chalk.dim(`\nSaved run to ${filePath}`));
      }
    }

    return exitCodeForResult(result, result.categories.length > 0);
  });
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerPlanCommand(program: Command, context: CommandContext): void {
  program
    .command('plan')
    .description('Find and rank vendors for an event')
    .argument('<description...>', 'Event description, e.g. "birthday party for 30 kids"')
    .option('-l, --location <name>', 'City to search in', 'Gurugram')
    .option('-c, --category <name...>', 'Vendor categories (skips category derivation)')
    .option('-k, --top-k <n>', 'Results per category', parsePositiveInt)
    .option('--details', 'Fetch place details for new vendors before embedding')
    .option('--all-vendors', 'Rank against every stored vendor, not only this run\'s')
    .option('--json', 'Print the run result as JSON')
    .option('--no-save', 'Do not write the run result to the data directory')
    .action(async (words: string[], options: PlanOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      process.exitCode = await withInterrupt((signal) =>
        handlePlan(words, options, base, context, signal)
      );
    });
}
