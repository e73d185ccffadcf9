/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * ~/.event-vendors/                     # Default data directory
 * ├── vectors/                          # LanceDB database (vendor_embeddings)
 * └── runs/
 *     └── <run_id>.json                 # e.g., 20261018-143512-birthday-party
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Rejects IDs containing `..`, `/` or `\`.
 *
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
function validateId(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Resolve a configured data directory, expanding a leading `~`.
 *
 * @example
 * ```typescript
 * resolveDataDir('~/vendors'); // '/Users/username/vendors'
 * resolveDataDir('data');      // '<cwd>/data'
 * ```
 */
export function resolveDataDir(dir: string): string {
  if (dir === '~' || dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return path.resolve(dir);
}

export function getVectorDbDir(dataDir: string): string {
  return path.join(dataDir, 'vectors');
}

export function getRunsDir(dataDir: string): string {
  return path.join(dataDir, 'runs');
}

export function getRunFilePath(dataDir: string, runId: string): string {
  validateId(runId, 'runId');
  return path.join(getRunsDir(dataDir), `${runId}.json`);
}

/**
 * Run ids sort by start time: `YYYYMMDD-HHMMSS-slug`.
 *
 * @example
 * ```typescript
 * generateRunId('Birthday party for 30 kids!', new Date('2026-10-18T14:35:12Z'));
 * // '20261018-143512-birthday-party-for-30'
 * ```
 */
export function generateRunId(eventDescription: string, now: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const slug = eventDescription
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, 4)
    .join('-');
  return slug ? `${date}-${time}-${slug}` : `${date}-${time}`;
}
