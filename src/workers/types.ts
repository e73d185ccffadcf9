/**
 * Worker Pool Types
 *
 * A unit of work is anything with a correlation key; the worker function
 * that processes it is supplied per batch, so one pool serves every service.
 *
 * @module workers/types
 */

import type { VendorDiscoveryError } from '../errors/index.js';

/**
 * One item of a batch.
 *
 * @typeParam TInput - Payload handed to the worker function
 */
export interface WorkUnit<TInput> {
  /** Identifier used to correlate the result with the input */
  key: string;
  /** Payload for the worker */
  input: TInput;
  /** Overrides the pool's retry count for this unit */
  retries?: number;
}

/**
 * Per-attempt context passed to the worker function.
 */
export interface AttemptContext {
  /** 1-based attempt number */
  attempt: number;
  /**
   * Aborts when this attempt times out. Run-level cancellation does not
   * abort an attempt already in flight.
   */
  signal: AbortSignal;
}

export type WorkerFn<TInput, TValue> = (
  unit: WorkUnit<TInput>,
  context: AttemptContext
) => Promise<TValue>;

/**
 * Outcome of one unit. Exactly one is produced per submitted unit.
 */
export type TaskResult<TValue> =
  | {
      key: string;
      ok: true;
      value: TValue;
      /** Attempts made, including the successful one */
      attempts: number;
    }
  | {
      key: string;
      ok: false;
      error: VendorDiscoveryError;
      /** Attempts made; 0 when the unit was cancelled before starting */
      attempts: number;
    };

export interface SubmitOptions<TInput, TValue> {
  /** Stops new units and retries once aborted, including units waiting on the gate */
  signal?: AbortSignal;
  /**
   * Awaited before each attempt, after the concurrency slot is granted and
   * outside the attempt timeout (e.g. a rate limiter acquire).
   */
  gate?: (unit: WorkUnit<TInput>) => Promise<void>;
  /** Called as each unit settles */
  onSettled?: (result: TaskResult<TValue>) => void;
}

/**
 * Counts for a finished batch.
 */
export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Extra attempts beyond the first, summed over units */
  retries: number;
}

export function summarizeBatch<TValue>(results: ReadonlyArray<TaskResult<TValue>>): BatchSummary {
  let succeeded = 0;
  let retries = 0;

  for (const result of results) {
    if (result.ok) {
      succeeded++;
    }
    retries += Math.max(0, result.attempts - 1);
  }

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    retries,
  };
}
