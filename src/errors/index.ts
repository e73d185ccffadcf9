/**
 * Error Taxonomy
 *
 * Every error the orchestration layer produces derives from
 * {@link VendorDiscoveryError}. Service errors carry a `retryable` flag that
 * the worker pool consults before scheduling another attempt.
 *
 * @module errors
 */

/**
 * External service classes, one Dispatcher each.
 */
export type ServiceName = 'query' | 'placesSearch' | 'placesDetail' | 'embedding';

export class VendorDiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VendorDiscoveryError';
  }
}

/**
 * Invalid rate limiter parameters, or an acquire larger than the bucket.
 * Raised before any work is dispatched.
 */
export class RateLimitMisconfiguredError extends VendorDiscoveryError {
  constructor(message: string) {
    super(message);
    this.name = 'RateLimitMisconfiguredError';
  }
}

/**
 * Missing credentials or invalid environment.
 */
export class ConfigError extends VendorDiscoveryError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Failure reported by (or while calling) an external service.
 */
export class ServiceError extends VendorDiscoveryError {
  constructor(
    message: string,
    public readonly service: ServiceName | 'store',
    public readonly retryable: boolean,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

/**
 * Timeouts, 5xx, throttling and network failures. Eligible for retry.
 */
export class TransientServiceError extends ServiceError {
  constructor(
    message: string,
    service: ServiceName | 'store',
    statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, service, true, statusCode, options);
    this.name = 'TransientServiceError';
  }
}

/**
 * Malformed input, authorization failure or rejected content.
 */
export class PermanentServiceError extends ServiceError {
  constructor(
    message: string,
    service: ServiceName | 'store',
    statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, service, false, statusCode, options);
    this.name = 'PermanentServiceError';
  }
}

export class TimeoutError extends TransientServiceError {
  constructor(
    public readonly timeoutMs: number,
    service: ServiceName | 'store',
    operation: string
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, service, 408);
    this.name = 'TimeoutError';
  }
}

/**
 * A unit that was never started (or not retried) because the run was cancelled.
 */
export class CancelledError extends VendorDiscoveryError {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Two vectors compared together do not share a dimension.
 */
export class DimensionMismatchError extends VendorDiscoveryError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly recordId?: string
  ) {
    super(
      recordId
        ? `Vector for '${recordId}' has dimension ${actual}, expected ${expected}`
        : `Vector has dimension ${actual}, expected ${expected}`
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Empty or zero-norm vector where a direction is required.
 */
export class InvalidVectorError extends VendorDiscoveryError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidVectorError';
  }
}

// ============================================================================
// Classification
// ============================================================================

/**
 * HTTP-ish status codes that mean "try again later".
 */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
}

const TRANSIENT_PATTERNS = [
  'rate limit',
  'quota',
  'timeout',
  'timed out',
  'network',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'fetch failed',
  '429',
  '500',
  '502',
  '503',
  '504',
];

const REJECTION_PATTERNS = ['safety', 'blocked', 'recitation', 'prohibited'];

/**
 * Map an arbitrary thrown value onto the service error taxonomy.
 *
 * Errors already in the taxonomy are returned unchanged. Otherwise a
 * numeric `status` property decides; failing that, the message is matched
 * against known transient and content-rejection patterns. Anything else is
 * permanent.
 *
 * @param error - Value caught from an external call
 * @param service - Service the call was made against
 */
export function classifyError(
  error: unknown,
  service: ServiceName | 'store'
): VendorDiscoveryError {
  if (error instanceof VendorDiscoveryError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);

  if (status !== undefined) {
    return isRetryableStatus(status)
      ? new TransientServiceError(message, service, status, { cause: error })
      : new PermanentServiceError(message, service, status, { cause: error });
  }

  const lower = message.toLowerCase();
  if (REJECTION_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new PermanentServiceError(`Content rejected: ${message}`, service, undefined, {
      cause: error,
    });
  }
  if (TRANSIENT_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new TransientServiceError(message, service, undefined, { cause: error });
  }

  return new PermanentServiceError(message, service, undefined, { cause: error });
}

/**
 * True when another attempt could plausibly succeed.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof ServiceError && error.retryable;
}

/**
 * Plain shape used in run manifests.
 */
export interface ErrorSummary {
  name: string;
  message: string;
  retryable: boolean;
}

export function summarizeError(error: unknown): ErrorSummary {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, retryable: isRetryable(error) };
  }
  return { name: 'Error', message: String(error), retryable: false };
}
