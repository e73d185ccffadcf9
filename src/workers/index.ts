/**
 * Worker Framework Exports
 *
 * Rate limiting, bounded concurrency and retrying execution of work units.
 *
 * @module workers
 */

// ============================================================================
// Types
// ============================================================================

export type {
  AttemptContext,
  BatchSummary,
  SubmitOptions,
  TaskResult,
  WorkerFn,
  WorkUnit,
} from './types.js';

export { summarizeBatch } from './types.js';

// ============================================================================
// Rate Limiting and Concurrency
// ============================================================================

export { RateLimiter } from './rate-limiter.js';
export type { RateLimiterOptions, RateLimiterStats } from './rate-limiter.js';

export { ConcurrencyLimiter } from './concurrency.js';
export type { ConcurrencyStats } from './concurrency.js';

// ============================================================================
// Pool
// ============================================================================

export { WorkerPool } from './pool.js';
export type { WorkerPoolOptions } from './pool.js';

export {
  calculateBackoff,
  DEFAULT_BACKOFF,
  sleep,
  systemClock,
  withTimeout,
  type BackoffConfig,
  type Clock,
} from './timing.js';
