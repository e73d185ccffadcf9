/**
 * Worker Pool
 *
 * Runs batches of units with bounded concurrency, per-attempt timeouts and
 * retry with backoff. Batches are fail-soft: every unit produces a
 * {@link TaskResult}, and `submit` itself never rejects.
 *
 * @module workers/pool
 */

import {
  CancelledError,
  classifyError,
  isRetryable,
  type ServiceName,
  type VendorDiscoveryError,
} from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ConcurrencyLimiter, type ConcurrencyStats } from './concurrency.js';
import {
  calculateBackoff,
  DEFAULT_BACKOFF,
  systemClock,
  withTimeout,
  type BackoffConfig,
  type Clock,
} from './timing.js';
import type { SubmitOptions, TaskResult, WorkerFn, WorkUnit } from './types.js';

/** Default retries after the first attempt */
const DEFAULT_RETRIES = 2;

/** Default per-attempt timeout (30 seconds) */
const DEFAULT_TIMEOUT_MS = 30000;

export interface WorkerPoolOptions {
  /** Service the pool's work targets, used to classify errors */
  service: ServiceName;
  /** Maximum units in flight at once */
  maxConcurrency: number;
  /** Retries after the first attempt for retryable errors (default: 2) */
  retries?: number;
  /** Timeout for a single attempt in ms (default: 30000) */
  timeoutMs?: number;
  backoff?: BackoffConfig;
  clock?: Clock;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const pool = new WorkerPool({ service: 'embedding', maxConcurrency: 5 });
 * const results = await pool.submit(
 *   texts.map((text, i) => ({ key: String(i), input: text })),
 *   (unit) => client.embed(unit.input)
 * );
 * ```
 */
export class WorkerPool {
  readonly service: ServiceName;
  readonly maxConcurrency: number;

  private readonly limiter: ConcurrencyLimiter;
  private readonly retries: number;
  private readonly timeoutMs: number;
  private readonly backoff: BackoffConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: WorkerPoolOptions) {
    const retries = options.retries ?? DEFAULT_RETRIES;
    if (!Number.isInteger(retries) || retries < 0) {
      throw new Error(`retries must be a non-negative integer, got ${retries}`);
    }

    this.service = options.service;
    this.maxConcurrency = options.maxConcurrency;
    this.logger = options.logger ?? silentLogger;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrency, this.logger);
    this.retries = retries;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Process every unit and resolve with one result per unit, in input order.
   *
   * Units beyond `maxConcurrency` queue. Once `options.signal` aborts, units
   * that have not started settle with a {@link CancelledError}, including
   * those still waiting on the gate; attempts already in flight run to
   * completion but are not retried.
   *
   * A timed-out attempt keeps its slot until the worker's promise settles;
   * workers should honor `context.signal` to release it promptly.
   */
  async submit<TInput, TValue>(
    units: ReadonlyArray<WorkUnit<TInput>>,
    worker: WorkerFn<TInput, TValue>,
    options: SubmitOptions<TInput, TValue> = {}
  ): Promise<Array<TaskResult<TValue>>> {
    return Promise.all(
      units.map(async (unit) => {
        const result = await this.runUnit(unit, worker, options);
        options.onSettled?.(result);
        return result;
      })
    );
  }

  getStats(): ConcurrencyStats {
    return this.limiter.getStats();
  }

  private async runUnit<TInput, TValue>(
    unit: WorkUnit<TInput>,
    worker: WorkerFn<TInput, TValue>,
    options: SubmitOptions<TInput, TValue>
  ): Promise<TaskResult<TValue>> {
    const { signal, gate } = options;
    const maxAttempts = (unit.retries ?? this.retries) + 1;
    let attempts = 0;
    let lastError: VendorDiscoveryError = new CancelledError(`Unit '${unit.key}' was cancelled`);

    while (attempts < maxAttempts) {
      const outcome = await this.limiter.run(async () => {
        // Checked after the slot is granted: queued units see a late abort too.
        if (signal?.aborted) {
          return null;
        }
        try {
          if (gate && !(await passGate(gate(unit), signal))) {
            return null;
          }
          attempts++;
          const value = await withTimeout(
            (attemptSignal) => worker(unit, { attempt: attempts, signal: attemptSignal }),
            this.timeoutMs,
            this.service,
            `${this.service} unit '${unit.key}'`
          );
          return { ok: true as const, value };
        } catch (error) {
          return { ok: false as const, error: classifyError(error, this.service) };
        }
      });

      if (outcome === null) {
        return { key: unit.key, ok: false, error: lastError, attempts };
      }
      if (outcome.ok) {
        return { key: unit.key, ok: true, value: outcome.value, attempts };
      }

      lastError = outcome.error;
      if (!isRetryable(lastError) || attempts >= maxAttempts || signal?.aborted) {
        break;
      }

      const delay = calculateBackoff(attempts - 1, this.backoff);
      this.logger.debug(
        `${this.service}: '${unit.key}' attempt ${attempts} failed (${lastError.message}), retrying in ${Math.round(delay)}ms`
      );
      await this.clock.sleep(delay);
    }

    this.logger.warn(`${this.service}: '${unit.key}' failed after ${attempts} attempt(s): ${lastError.message}`);
    return { key: unit.key, ok: false, error: lastError, attempts };
  }
}

/**
 * Await a gate unless the signal aborts first. Resolves `false` on abort;
 * a gate rejection propagates.
 */
async function passGate(gate: Promise<void>, signal: AbortSignal | undefined): Promise<boolean> {
  if (!signal) {
    await gate;
    return true;
  }
  if (signal.aborted) {
    gate.catch(() => undefined);
    return false;
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<false>((resolve) => {
    onAbort = () => resolve(false);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  const opened = gate.then(() => true);
  try {
    const passed = await Promise.race([opened, aborted]);
    if (!passed) {
      // The gate settles later; its outcome no longer matters
      opened.catch(() => undefined);
    }
    return passed && !signal.aborted;
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
