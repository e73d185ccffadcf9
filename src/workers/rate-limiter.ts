/**
 * Token bucket rate limiter.
 *
 * The bucket holds up to `capacity` tokens and refills continuously at
 * `refillRate` tokens per second. Each external call spends tokens equal to
 * its cost. Refill, comparison and deduction run as one exclusive step:
 * callers are queued behind a single-slot {@link ConcurrencyLimiter}, so the
 * balance is never observed negative and waiters are served in order.
 *
 * @module workers/rate-limiter
 */

import { RateLimitMisconfiguredError } from '../errors/index.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { systemClock, type Clock } from './timing.js';

/**
 * Shortfalls below this many tokens are float noise from the refill
 * arithmetic and count as satisfied.
 */
const TOKEN_EPSILON = 1e-9;

export interface RateLimiterOptions {
  /** Maximum tokens (burst size) */
  capacity: number;
  /** Tokens added per second */
  refillRate: number;
  /** Start with this many tokens (default: capacity) */
  initialTokens?: number;
  clock?: Clock;
}

export interface RateLimiterStats {
  /** Completed acquire() calls */
  acquired: number;
  /** Tokens spent in total */
  tokensSpent: number;
  /** Time spent suspended waiting for refill, in ms */
  waitedMs: number;
}

/**
 * @example
 * ```typescript
 * // 60 requests/minute with bursts of up to 5
 * const limiter = RateLimiter.perMinute(60, 5);
 * await limiter.acquire();
 * await client.search(query);
 * ```
 */
export class RateLimiter {
  readonly capacity: number;
  readonly refillRate: number;

  private tokens: number;
  private lastRefill: number;
  private readonly clock: Clock;
  private readonly mutex = new ConcurrencyLimiter(1);
  private readonly stats: RateLimiterStats = { acquired: 0, tokensSpent: 0, waitedMs: 0 };

  /**
   * @throws RateLimitMisconfiguredError on non-positive or non-finite parameters
   */
  constructor(options: RateLimiterOptions) {
    const { capacity, refillRate } = options;
    if (!Number.isFinite(capacity) || capacity <= 0) {
      throw new RateLimitMisconfiguredError(`capacity must be a positive number, got ${capacity}`);
    }
    if (!Number.isFinite(refillRate) || refillRate <= 0) {
      throw new RateLimitMisconfiguredError(
        `refillRate must be a positive number, got ${refillRate}`
      );
    }

    const initial = options.initialTokens ?? capacity;
    if (!Number.isFinite(initial) || initial < 0 || initial > capacity) {
      throw new RateLimitMisconfiguredError(
        `initialTokens must be within [0, ${capacity}], got ${initial}`
      );
    }

    this.capacity = capacity;
    this.refillRate = refillRate;
    this.clock = options.clock ?? systemClock;
    this.tokens = initial;
    this.lastRefill = this.clock.now();
  }

  /**
   * Build a limiter from a requests-per-minute quota.
   *
   * @param requestsPerMinute - Sustained rate
   * @param burst - Bucket capacity (default: 1, no bursting)
   */
  static perMinute(requestsPerMinute: number, burst = 1, clock?: Clock): RateLimiter {
    return new RateLimiter({ capacity: burst, refillRate: requestsPerMinute / 60, clock });
  }

  /**
   * Wait until `n` tokens are available, then deduct them.
   *
   * @param n - Tokens to spend (default: 1)
   * @throws RateLimitMisconfiguredError if `n` is not positive or exceeds capacity
   */
  async acquire(n = 1): Promise<void> {
    if (!Number.isFinite(n) || n <= 0) {
      throw new RateLimitMisconfiguredError(`acquire() needs a positive token count, got ${n}`);
    }
    if (n > this.capacity) {
      throw new RateLimitMisconfiguredError(
        `acquire(${n}) can never succeed: bucket capacity is ${this.capacity}`
      );
    }

    await this.mutex.run(async () => {
      for (;;) {
        this.refill();
        const shortfall = n - this.tokens;

        if (shortfall <= TOKEN_EPSILON) {
          this.tokens = Math.max(0, this.tokens - n);
          this.stats.acquired++;
          this.stats.tokensSpent += n;
          return;
        }

        const waitMs = (shortfall / this.refillRate) * 1000;
        this.stats.waitedMs += waitMs;
        await this.clock.sleep(waitMs);
      }
    });
  }

  /**
   * Current balance including refill accrued since the last acquire.
   * Does not modify the bucket.
   */
  available(): number {
    const elapsedSeconds = Math.max(0, this.clock.now() - this.lastRefill) / 1000;
    return Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
  }

  getStats(): RateLimiterStats {
    return { ...this.stats };
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }
}
