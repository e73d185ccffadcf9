/**
 * Run Storage Operations
 *
 * @module storage/runs
 */

import type { RunResult } from '../pipeline/types.js';
import { atomicWriteJson } from './atomic.js';
import { getRunFilePath } from './paths.js';

/**
 * Save a run result as `<dataDir>/runs/<runId>.json`.
 *
 * @returns Path of the written file
 */
export async function saveRunResult(dataDir: string, result: RunResult): Promise<string> {
  const filePath = getRunFilePath(dataDir, result.runId);
  await atomicWriteJson(filePath, result);
  return filePath;
}
