/**
 * Dispatcher
 *
 * Pairs one {@link RateLimiter} with one {@link WorkerPool} for a single
 * external service class. Every attempt of every unit pays the limiter
 * before the external call is made, so the aggregate call rate stays within
 * quota however many units the pool runs at once.
 *
 * @module dispatch/dispatcher
 */

import { RateLimitMisconfiguredError, type ServiceName, type VendorDiscoveryError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { WorkerPool } from '../workers/pool.js';
import type { RateLimiter } from '../workers/rate-limiter.js';
import { summarizeBatch, type AttemptContext, type TaskResult } from '../workers/types.js';

/**
 * Result for one input of a batch, carrying the input back to the caller.
 */
export type BatchItem<TInput, TOutput> =
  | { key: string; input: TInput; ok: true; value: TOutput; attempts: number }
  | { key: string; input: TInput; ok: false; error: VendorDiscoveryError; attempts: number };

/**
 * Describes one batch: what to call, on what, and at what token cost.
 */
export interface DispatchRequest<TInput, TOutput> {
  inputs: readonly TInput[];
  /** Correlation key for an input; must be unique within the batch */
  keyOf: (input: TInput, index: number) => string;
  /** The external call for one input */
  call: (input: TInput, context: AttemptContext) => Promise<TOutput>;
  /** Tokens per call (default: the dispatcher's cost) */
  cost?: number | ((input: TInput) => number);
  signal?: AbortSignal;
}

export interface DispatcherStats {
  /** Batches dispatched */
  batches: number;
  /** Units that succeeded */
  succeeded: number;
  /** Units that failed after retries */
  failed: number;
  /** Retry attempts across all units */
  retries: number;
}

export interface DispatcherOptions {
  service: ServiceName;
  limiter: RateLimiter;
  pool: WorkerPool;
  /** Default tokens per call (default: 1) */
  cost?: number;
  logger?: Logger;
}

export class Dispatcher {
  readonly service: ServiceName;
  readonly cost: number;

  private readonly limiter: RateLimiter;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;
  private readonly stats: DispatcherStats = { batches: 0, succeeded: 0, failed: 0, retries: 0 };

  /**
   * @throws RateLimitMisconfiguredError if the per-call cost can never be paid
   */
  constructor(options: DispatcherOptions) {
    const cost = options.cost ?? 1;
    if (!Number.isFinite(cost) || cost <= 0) {
      throw new RateLimitMisconfiguredError(`${options.service}: call cost must be positive, got ${cost}`);
    }
    if (cost > options.limiter.capacity) {
      throw new RateLimitMisconfiguredError(
        `${options.service}: call cost ${cost} exceeds rate limiter capacity ${options.limiter.capacity}`
      );
    }

    this.service = options.service;
    this.cost = cost;
    this.limiter = options.limiter;
    this.pool = options.pool;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fan a batch out over the pool. Resolves with one item per input, in
   * input order; per-item failures never reject the batch.
   */
  async dispatch<TInput, TOutput>(
    request: DispatchRequest<TInput, TOutput>
  ): Promise<Array<BatchItem<TInput, TOutput>>> {
    const { inputs, keyOf, call, signal } = request;
    const costOf = this.resolveCost(request.cost);

    const units = inputs.map((input, index) => ({ key: keyOf(input, index), input }));
    this.logger.debug(`${this.service}: dispatching ${units.length} unit(s)`);

    const results: Array<TaskResult<TOutput>> = await this.pool.submit(
      units,
      (unit, context) => call(unit.input, context),
      {
        signal,
        gate: (unit) => this.limiter.acquire(costOf(unit.input)),
      }
    );

    const summary = summarizeBatch(results);
    this.stats.batches++;
    this.stats.succeeded += summary.succeeded;
    this.stats.failed += summary.failed;
    this.stats.retries += summary.retries;

    if (summary.failed > 0) {
      this.logger.warn(`${this.service}: ${summary.failed}/${summary.total} unit(s) failed`);
    }

    return results.map((result, index): BatchItem<TInput, TOutput> => {
      const input = inputs[index];
      return result.ok
        ? { key: result.key, input, ok: true, value: result.value, attempts: result.attempts }
        : { key: result.key, input, ok: false, error: result.error, attempts: result.attempts };
    });
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  private resolveCost<TInput>(cost: DispatchRequest<TInput, unknown>['cost']): (input: TInput) => number {
    if (cost === undefined) {
      return () => this.cost;
    }
    if (typeof cost === 'number') {
      return () => cost;
    }
    return cost;
  }
}
