/**
 * Tests for the token bucket rate limiter.
 */

import { describe, it, expect } from '@jest/globals';
import { RateLimitMisconfiguredError } from '../errors/index.js';
import { RateLimiter } from './rate-limiter.js';
import type { Clock } from './timing.js';

/**
 * Clock whose sleep advances time instantly.
 */
function createVirtualClock(): Clock & { advance(ms: number): void } {
  let now = 0;
  return {
    now: () => now,
    sleep: async (ms) => {
      now += ms;
    },
    advance: (ms) => {
      now += ms;
    },
  };
}

describe('RateLimiter', () => {
  describe('constructor', () => {
    it('should reject non-positive capacity', () => {
      expect(() => new RateLimiter({ capacity: 0, refillRate: 1 })).toThrow(
        RateLimitMisconfiguredError
      );
    });

    it('should reject non-positive or non-finite refill rates', () => {
      expect(() => new RateLimiter({ capacity: 1, refillRate: 0 })).toThrow(
        RateLimitMisconfiguredError
      );
      expect(() => new RateLimiter({ capacity: 1, refillRate: Number.NaN })).toThrow(
        RateLimitMisconfiguredError
      );
    });

    it('should reject initial tokens above capacity', () => {
      expect(() => new RateLimiter({ capacity: 2, refillRate: 1, initialTokens: 3 })).toThrow(
        'initialTokens must be within [0, 2], got 3'
      );
    });

    it('should start full by default', () => {
      const limiter = new RateLimiter({ capacity: 3, refillRate: 1, clock: createVirtualClock() });
      expect(limiter.available()).toBe(3);
    });
  });

  describe('perMinute', () => {
    it('should convert requests per minute to tokens per second', () => {
      const limiter = RateLimiter.perMinute(120, 4);
      expect(limiter.capacity).toBe(4);
      expect(limiter.refillRate).toBe(2);
    });
  });

  describe('acquire', () => {
    it('should serve a burst immediately, then one token per refill interval', async () => {
      const clock = createVirtualClock();
      const limiter = new RateLimiter({ capacity: 2, refillRate: 1, clock });
      const times: number[] = [];

      for (let i = 0; i < 10; i++) {
        await limiter.acquire();
        times.push(clock.now());
      }

      expect(times).toEqual([0, 0, 1000, 2000, 3000, 4000, 5000, 6000, 7000, 8000]);
    });

    it('should keep concurrent callers within the rate', async () => {
      const clock = createVirtualClock();
      const limiter = new RateLimiter({ capacity: 2, refillRate: 1, clock });

      await Promise.all(Array.from({ length: 10 }, () => limiter.acquire()));

      expect(clock.now()).toBe(8000);
      expect(limiter.getStats()).toEqual({ acquired: 10, tokensSpent: 10, waitedMs: 8000 });
    });

    it('should proceed without waiting when exactly enough tokens are available', async () => {
      const clock = createVirtualClock();
      const limiter = new RateLimiter({ capacity: 4, refillRate: 1, initialTokens: 2, clock });

      await limiter.acquire(2);

      expect(clock.now()).toBe(0);
      expect(limiter.getStats().waitedMs).toBe(0);
      expect(limiter.available()).toBe(0);
    });

    it('should wait only for the shortfall', async () => {
      const clock = createVirtualClock();
      const limiter = new RateLimiter({ capacity: 4, refillRate: 2, initialTokens: 1, clock });

      await limiter.acquire(3);

      // 2 missing tokens at 2 tokens/s
      expect(clock.now()).toBe(1000);
    });

    it('should reject a cost larger than capacity', async () => {
      const limiter = new RateLimiter({ capacity: 2, refillRate: 1 });
      await expect(limiter.acquire(3)).rejects.toThrow(
        'acquire(3) can never succeed: bucket capacity is 2'
      );
    });

    it('should reject a non-positive cost', async () => {
      const limiter = new RateLimiter({ capacity: 2, refillRate: 1 });
      await expect(limiter.acquire(0)).rejects.toBeInstanceOf(RateLimitMisconfiguredError);
    });
  });

  describe('available', () => {
    it('should include accrued refill without spending it', () => {
      const clock = createVirtualClock();
      const limiter = new RateLimiter({ capacity: 5, refillRate: 1, initialTokens: 0, clock });

      clock.advance(2500);

      expect(limiter.available()).toBe(2.5);
      expect(limiter.available()).toBe(2.5);
    });

    it('should never exceed capacity', () => {
      const clock = createVirtualClock();
      const limiter = new RateLimiter({ capacity: 2, refillRate: 1, initialTokens: 1, clock });

      clock.advance(60_000);

      expect(limiter.available()).toBe(2);
    });
  });
});
