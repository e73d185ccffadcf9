/**
 * Tests for backoff and timeout helpers.
 */

import { describe, it, expect } from '@jest/globals';
import { TimeoutError } from '../errors/index.js';
import { calculateBackoff, DEFAULT_BACKOFF, withTimeout } from './timing.js';

describe('calculateBackoff', () => {
  it('should double per attempt without jitter', () => {
    const noJitter = () => 0;
    expect(calculateBackoff(0, DEFAULT_BACKOFF, noJitter)).toBe(500);
    expect(calculateBackoff(1, DEFAULT_BACKOFF, noJitter)).toBe(1000);
    expect(calculateBackoff(2, DEFAULT_BACKOFF, noJitter)).toBe(2000);
  });

  it('should cap the exponential delay', () => {
    expect(calculateBackoff(6, DEFAULT_BACKOFF, () => 0)).toBe(4000);
  });

  it('should add jitter proportional to the delay', () => {
    // 1000 + 1000 * 0.3 * 0.5
    expect(calculateBackoff(1, DEFAULT_BACKOFF, () => 0.5)).toBe(1150);
  });
});

function untilAborted(signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason));
  });
}

describe('withTimeout', () => {
  it('should resolve with the value when the call finishes first', async () => {
    await expect(withTimeout(async () => 'done', 1000, 'query', 'derive')).resolves.toBe('done');
  });

  it('should reject with a TimeoutError when the timer fires first', async () => {
    const pending = withTimeout(untilAborted, 10, 'embedding', 'embed text');

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('embed text timed out after 10ms');
  });

  it('should abort the call signal with the timeout as reason', async () => {
    let seen: AbortSignal | undefined;

    await withTimeout(
      (signal) => {
        seen = signal;
        return untilAborted(signal);
      },
      10,
      'query',
      'derive'
    ).catch(() => undefined);

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(TimeoutError);
  });

  it('should not reject before a call that ignores the signal has settled', async () => {
    let settled = false;
    const slowCall = async (): Promise<string> => {
      await new Promise((resolve) => setTimeout(resolve, 50));
      settled = true;
      return 'late';
    };

    await expect(withTimeout(slowCall, 10, 'placesDetail', 'details')).rejects.toBeInstanceOf(TimeoutError);
    expect(settled).toBe(true);
  });

  it('should pass through the call rejection', async () => {
    await expect(
      withTimeout(async () => Promise.reject(new Error('bad request')), 1000, 'placesSearch', 'search')
    ).rejects.toThrow('bad request');
  });
});
