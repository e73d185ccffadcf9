/**
 * Tests for WorkerPool: ordering, bounded concurrency, retries, timeouts
 * and cancellation.
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  CancelledError,
  PermanentServiceError,
  TimeoutError,
  TransientServiceError,
} from '../errors/index.js';
import { WorkerPool, type WorkerPoolOptions } from './pool.js';
import type { Clock } from './timing.js';
import { summarizeBatch, type TaskResult, type WorkUnit } from './types.js';

// ============================================================================
// Helpers
// ============================================================================

const instantClock: Clock = {
  now: () => 0,
  sleep: async () => undefined,
};

function createPool(overrides: Partial<WorkerPoolOptions> = {}): WorkerPool {
  return new WorkerPool({
    service: 'placesSearch',
    maxConcurrency: 2,
    clock: instantClock,
    ...overrides,
  });
}

function units(count: number): Array<WorkUnit<number>> {
  return Array.from({ length: count }, (_, i) => ({ key: `unit-${i}`, input: i }));
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Tests
// ============================================================================

describe('WorkerPool', () => {
  it('should reject a negative retry count', () => {
    expect(() => createPool({ retries: -1 })).toThrow('retries must be a non-negative integer, got -1');
  });

  it('should return results in input order', async () => {
    const pool = createPool({ maxConcurrency: 3 });

    const results = await pool.submit(units(3), async (unit) => {
      // Later units finish first
      await delay((3 - unit.input) * 5);
      return unit.input * 10;
    });

    expect(results.map((r) => r.key)).toEqual(['unit-0', 'unit-1', 'unit-2']);
    expect(results.map((r) => (r.ok ? r.value : null))).toEqual([0, 10, 20]);
  });

  it('should bound units in flight', async () => {
    const pool = createPool({ maxConcurrency: 3 });
    let running = 0;
    let peak = 0;

    const results = await pool.submit(units(20), async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
      return true;
    });

    expect(peak).toBe(3);
    expect(results.every((r) => r.ok)).toBe(true);
  });

  it('should retry transient failures until success', async () => {
    const pool = createPool({ retries: 2 });
    let calls = 0;

    const [result] = await pool.submit(units(1), async () => {
      calls++;
      if (calls < 3) {
        throw new TransientServiceError('Server error (503)', 'placesSearch', 503);
      }
      return 'ok';
    });

    expect(result).toEqual({ key: 'unit-0', ok: true, value: 'ok', attempts: 3 });
  });

  it('should give up after the retry budget', async () => {
    const pool = createPool({ retries: 2 });
    const worker = jest.fn(async () => {
      throw new TransientServiceError('Quota exceeded', 'placesSearch', 429);
    });

    const [result] = await pool.submit(units(1), worker);

    expect(worker).toHaveBeenCalledTimes(3);
    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(3);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientServiceError);
    }
  });

  it('should not retry permanent failures', async () => {
    const pool = createPool({ retries: 2 });
    const worker = jest.fn(async () => {
      throw new PermanentServiceError('API error (400)', 'placesSearch', 400);
    });

    const [result] = await pool.submit(units(1), worker);

    expect(worker).toHaveBeenCalledTimes(1);
    expect(result.attempts).toBe(1);
  });

  it('should classify plain errors before deciding on retry', async () => {
    const pool = createPool({ retries: 1 });
    const worker = jest.fn(async () => {
      throw new Error('read ECONNRESET');
    });

    const [result] = await pool.submit(units(1), worker);

    expect(worker).toHaveBeenCalledTimes(2);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientServiceError);
    }
  });

  it('should honor a per-unit retry override', async () => {
    const pool = createPool({ retries: 2 });
    const worker = jest.fn(async () => {
      throw new TransientServiceError('Server error (500)', 'placesSearch', 500);
    });

    const [result] = await pool.submit([{ key: 'once', input: 0, retries: 0 }], worker);

    expect(worker).toHaveBeenCalledTimes(1);
    expect(result.attempts).toBe(1);
  });

  it('should time out a slow attempt', async () => {
    const pool = createPool({ retries: 0, timeoutMs: 10 });

    const [result] = await pool.submit(
      units(1),
      (_unit, context) =>
        new Promise<number>((_resolve, reject) => {
          context.signal.addEventListener('abort', () => reject(context.signal.reason));
        })
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TimeoutError);
      expect(result.error.message).toBe("placesSearch unit 'unit-0' timed out after 10ms");
    }
  });

  it('should keep the concurrency bound while timed-out attempts are still running', async () => {
    const pool = createPool({ maxConcurrency: 1, retries: 2, timeoutMs: 20 });
    let running = 0;
    let peak = 0;

    // The worker ignores its signal and outlives every timeout
    const results = await pool.submit(units(2), async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(100);
      running--;
      return true;
    });

    expect(peak).toBe(1);
    expect(running).toBe(0);
    expect(results.map((r) => r.attempts)).toEqual([3, 3]);
    for (const result of results) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TimeoutError);
      }
    }
  });

  it('should abort the attempt signal when the attempt times out', async () => {
    const pool = createPool({ retries: 0, timeoutMs: 10 });
    const signals: AbortSignal[] = [];

    await pool.submit(units(1), async (_unit, context) => {
      signals.push(context.signal);
      await delay(30);
      return 0;
    });

    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(signals[0].reason).toBeInstanceOf(TimeoutError);
  });

  it('should cancel units still waiting on the gate when the signal aborts', async () => {
    const pool = createPool({ maxConcurrency: 2 });
    const controller = new AbortController();
    const worker = jest.fn(async () => 1);
    setTimeout(() => controller.abort(), 10);

    const results = await pool.submit(units(2), worker, {
      signal: controller.signal,
      gate: () => new Promise<void>(() => undefined),
    });

    expect(worker).not.toHaveBeenCalled();
    for (const result of results) {
      expect(result.ok).toBe(false);
      expect(result.attempts).toBe(0);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(CancelledError);
      }
    }
  });

  it('should pass the gate before every attempt', async () => {
    const pool = createPool({ retries: 2 });
    const gate = jest.fn(async () => undefined);
    let calls = 0;

    await pool.submit(
      units(1),
      async (_unit, context) => {
        calls++;
        if (context.attempt < 2) {
          throw new TransientServiceError('Server error (502)', 'placesSearch', 502);
        }
        return calls;
      },
      { gate }
    );

    expect(gate).toHaveBeenCalledTimes(2);
  });

  it('should cancel every unit when the signal is already aborted', async () => {
    const pool = createPool();
    const controller = new AbortController();
    controller.abort();
    const worker = jest.fn(async () => 1);

    const results = await pool.submit(units(3), worker, { signal: controller.signal });

    expect(worker).not.toHaveBeenCalled();
    for (const result of results) {
      expect(result.ok).toBe(false);
      expect(result.attempts).toBe(0);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(CancelledError);
      }
    }
  });

  it('should let in-flight work finish and skip queued units after abort', async () => {
    const pool = createPool({ maxConcurrency: 1 });
    const controller = new AbortController();

    const results = await pool.submit(
      units(3),
      async (unit) => {
        if (unit.input === 0) {
          controller.abort();
        }
        return unit.input;
      },
      { signal: controller.signal }
    );

    expect(results[0]).toEqual({ key: 'unit-0', ok: true, value: 0, attempts: 1 });
    expect(results[1].ok).toBe(false);
    expect(results[1].attempts).toBe(0);
    expect(results[2].ok).toBe(false);
  });

  it('should report each unit as it settles', async () => {
    const pool = createPool();
    const settled: string[] = [];

    await pool.submit(units(3), async (unit) => unit.input, {
      onSettled: (result) => settled.push(result.key),
    });

    expect([...settled].sort()).toEqual(['unit-0', 'unit-1', 'unit-2']);
  });
});

describe('summarizeBatch', () => {
  it('should count successes, failures and extra attempts', () => {
    const error = new PermanentServiceError('nope', 'query');
    const results: Array<TaskResult<number>> = [
      { key: 'a', ok: true, value: 1, attempts: 1 },
      { key: 'b', ok: true, value: 2, attempts: 3 },
      { key: 'c', ok: false, error, attempts: 2 },
      { key: 'd', ok: false, error, attempts: 0 },
    ];

    expect(summarizeBatch(results)).toEqual({ total: 4, succeeded: 2, failed: 2, retries: 3 });
  });
});
