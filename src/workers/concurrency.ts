/**
 * Counting semaphore with a FIFO wait queue.
 *
 * Bounds in-flight work in {@link WorkerPool} and, with a limit of 1,
 * serves as the mutex around a rate limiter's refill-and-deduct step.
 *
 * @module workers/concurrency
 */

import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Snapshot of a limiter's occupancy.
 */
export interface ConcurrencyStats {
  /** Slots currently held */
  running: number;
  /** Callers waiting for a slot */
  queued: number;
  /** Maximum concurrent holders */
  limit: number;
}

/**
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(3);
 * const result = await limiter.run(() => client.search('florists'));
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private readonly queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent holders
   * @throws Error if limit is not a positive integer
   */
  constructor(
    limit: number,
    private readonly logger: Logger = silentLogger
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  /**
   * Resolves once a slot is held. Waiters are granted slots in arrival order.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Give a slot back, handing it straight to the oldest waiter if any.
   */
  release(): void {
    if (this.running <= 0) {
      this.logger.warn('ConcurrencyLimiter: release() called without matching acquire()');
      return;
    }

    const next = this.queue.shift();
    if (next) {
      // Slot passes to the waiter; running count is unchanged.
      next();
      return;
    }
    this.running--;
  }

  /**
   * Run `fn` while holding a slot. The slot is released even if `fn` throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyStats {
    return {
      running: this.running,
      queued: this.queue.length,
      limit: this.limit,
    };
  }
}
