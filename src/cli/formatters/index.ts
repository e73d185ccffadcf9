/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export { formatDuration, formatFailures, formatRunSummary } from './run-summary.js';
