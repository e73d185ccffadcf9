/**
 * Collect Command
 *
 * Searches fixed vendor categories and stores embeddings for vendors not
 * yet in the vector store, building up the corpus `plan --all-vendors`
 * ranks against.
 *
 * @module cli/commands/collect
 */

import type { Command } from 'commander';
import { resolveLocation } from '../../vendors/location.js';
import { getBaseCommand, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatRunSummary } from '../formatters/run-summary.js';
import { exitCodeForResult, withInterrupt, withRuntime, type CommandContext } from './shared.js';

export const DEFAULT_COLLECT_CATEGORIES = ['balloon decoration services', 'event decoration'];

export interface CollectCommandOptions {
  category: string[];
  location?: string;
  details?: boolean;
  json?: boolean;
}

/**
 * Handle `vendors collect`.
 */
export async function handleCollect(
  options: CollectCommandOptions,
  base: BaseCommand,
  context: CommandContext,
  signal?: AbortSignal
): Promise<ExitCode> {
  return withRuntime(base, context, async (runtime) => {
    const result = await runtime.pipeline.collect({
      categories: options.category,
      location: resolveLocation(options.location),
      fetchDetails: options.details === true,
      signal,
    });

    if (options.json) {
      base.json(result);
    } else {
      base.info(formatRunSummary(result));
      if (result.stats.stored > 0) {
        base.success(`Stored ${result.stats.stored} new vendor(s)`);
      }
    }

    return exitCodeForResult(result, result.stats.uniqueVendors > 0);
  });
}

export function registerCollectCommand(program: Command, context: CommandContext): void {
  program
    .command('collect')
    .description('Collect vendors for fixed categories into the vector store')
    .option('-c, --category <name...>', 'Categories to search', DEFAULT_COLLECT_CATEGORIES)
    .option('-l, --location <name>', 'City to search in', 'Gurugram')
    .option('--details', 'Fetch place details before embedding')
    .option('--json', 'Print the run result as JSON')
    .action(async (options: CollectCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      process.exitCode = await withInterrupt((signal) => handleCollect(options, base, context, signal));
    });
}
