/**
 * Run Summary Formatters
 *
 * Terminal output for a finished run: header, counts, per-category
 * rankings and the failure manifest.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { CategoryRanking, RunFailure, RunResult } from '../../pipeline/types.js';

/**
 * Format a duration in milliseconds for display.
 *
 * @example formatDuration(500) // "500ms"
 * @example formatDuration(1500) // "1.5s"
 * @example formatDuration(90000) // "1m 30s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

function formatRanking(ranking: CategoryRanking, names: Map<string, string>): string[] {
  const lines = [`${chalk.bold(ranking.category)} ${chalk.dim(`("${ranking.query}")`)}`];

  if (ranking.results.length === 0) {
    lines.push(chalk.dim('  no vendors ranked'));
  }
  for (const result of ranking.results) {
    const name = names.get(result.id) ?? result.id;
    lines.push(`  ${String(result.rank).padStart(2)}. ${name} ${chalk.dim(result.score.toFixed(3))}`);
  }
  if (ranking.excluded.length > 0) {
    lines.push(chalk.yellow(`  ${ranking.excluded.length} record(s) excluded`));
  }
  return lines;
}

/**
 * Format failures grouped in stage order, one line each.
 */
export function formatFailures(failures: readonly RunFailure[]): string {
  const lines = [chalk.bold.red(`Failures (${failures.length}):`)];
  for (const failure of failures) {
    const label = failure.category && failure.category !== failure.key
      ? `${failure.key} [${failure.category}]`
      : failure.key;
    const retry = failure.error.retryable ? chalk.dim(' (transient)') : '';
    lines.push(`  ${chalk.red('✘')} ${failure.stage}: ${label} - ${failure.error.message}${retry}`);
  }
  return lines.join('\n');
}

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Run:      20261018-143512-birthday-party-for-30
 * Event:    Birthday party for 30 kids
 * Location: Gurugram
 * Duration: 12.4s
 *
 * Results:
 *   Categories:      3
 *   Places found:    41
 *   Unique vendors:  29 (12 new)
 *   Ranked:          3
 *
 * balloon decoration ("balloon decorators for kids birthday")
 *    1. Sky Balloons 0.812
 * ```
 */
export function formatRunSummary(result: RunResult): string {
  const lines: string[] = [];
  const { stats } = result;

  lines.push(
    result.cancelled
      ? chalk.bold.yellow('=== Run Cancelled ===')
      : chalk.bold('=== Run Complete ===')
  );
  lines.push(`Run:      ${chalk.cyan(result.runId)}`);
  lines.push(`Event:    ${result.eventDescription}`);
  lines.push(`Location: ${result.location.name}`);
  lines.push(`Duration: ${formatDuration(stats.durationMs)}`);
  lines.push('');

  lines.push('Results:');
  lines.push(`  Categories:      ${stats.categories}`);
  lines.push(`  Places found:    ${stats.placesFound}`);
  lines.push(`  Unique vendors:  ${stats.uniqueVendors} (${stats.newVendors} new)`);
  if (stats.detailsFetched > 0) {
    lines.push(`  Details fetched: ${stats.detailsFetched}`);
  }
  lines.push(`  Stored:          ${stats.stored}`);
  lines.push(`  Ranked:          ${stats.ranked}`);

  const names = new Map(result.vendors.map((vendor) => [vendor.id, vendor.name]));
  for (const ranking of result.categories) {
    lines.push('');
    lines.push(...formatRanking(ranking, names));
  }

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(formatFailures(result.failures));
  }

  return lines.join('\n');
}
