/**
 * Time primitives: an injectable clock, per-call timeouts and retry backoff.
 *
 * @module workers/timing
 */

import { TimeoutError, type ServiceName } from '../errors/index.js';

/**
 * Source of time for components that wait. Tests substitute a virtual clock
 * whose `sleep` advances `now` instantly.
 */
export interface Clock {
  /** Milliseconds since an arbitrary epoch */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Backoff settings for retryable failures.
 */
export interface BackoffConfig {
  /** Base delay in milliseconds */
  baseDelayMs: number;
  /** Upper bound before jitter */
  maxDelayMs: number;
  /** Jitter as a fraction of the exponential delay (0..1) */
  jitterRatio: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 4000,
  jitterRatio: 0.3,
};

/**
 * Formula: min(maxDelay, baseDelay * 2^attempt) * (1 + random * jitterRatio)
 *
 * @param attempt - Retry number, 0 for the first retry
 * @param random - Injectable random source in [0, 1)
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponential = Math.min(config.maxDelayMs, config.baseDelayMs * Math.pow(2, attempt));
  return exponential + exponential * config.jitterRatio * random();
}

/**
 * Race `fn` against a timer. The timer is always cleared.
 *
 * `fn` receives a signal that aborts, with the {@link TimeoutError} as its
 * reason, when the timer fires. The rejection waits until the call itself
 * settles, so a caller holding a concurrency slot never overlaps the
 * abandoned call with its next one.
 *
 * @throws TimeoutError when the timer fires first
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  service: ServiceName | 'store',
  operation: string
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(timeoutMs, service, operation);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  let call: Promise<T>;
  try {
    call = fn(controller.signal);
  } catch (error) {
    clearTimeout(timeoutId);
    throw error;
  }

  try {
    return await Promise.race([call, timeoutPromise]);
  } catch (error) {
    if (controller.signal.aborted) {
      await call.then(
        () => undefined,
        () => undefined
      );
    }
    throw error;
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
