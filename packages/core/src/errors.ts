/**
 * Custom error classes for the orchestration core
 * These errors provide safe, non-PHI error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input or configuration
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

// ============================================================================
// ORCHESTRATION ERRORS
// ============================================================================

/**
 * The compute provider failed.
 *
 * Every caller that shared the failed execution receives the same instance.
 * The message is taken from operational errors only; anything else is
 * reported with a generic message and the raw cause stays in the logs.
 */
export class ComputeFailedError extends AppError {
  public readonly key: string;

  constructor(key: string, detail = 'Analysis provider failed') {
    super(detail, 'COMPUTE_FAILED', 502);
    this.name = 'ComputeFailedError';
    this.key = key;
  }

  static fromCause(key: string, cause: unknown): ComputeFailedError {
    if (isOperationalError(cause)) {
      return new ComputeFailedError(key, cause.message);
    }
    return new ComputeFailedError(key);
  }
}

/**
 * A caller's wait deadline elapsed while the computation is still running.
 * Local to that caller: the computation continues and fills the cache.
 */
export class JobTimeoutError extends AppError {
  public readonly key: string;
  public readonly timeoutMs: number;
  public readonly retryable = true;
  /** Suggested retry delay in seconds */
  public readonly retryAfter: number;

  constructor(key: string, timeoutMs: number) {
    super(`Analysis still processing after ${timeoutMs}ms`, 'JOB_TIMEOUT', 503);
    this.name = 'JobTimeoutError';
    this.key = key;
    this.timeoutMs = timeoutMs;
    this.retryAfter = Math.max(1, Math.ceil(timeoutMs / 1000));
  }
}

/**
 * The entry a caller was waiting on was invalidated. The caller must retry.
 */
export class KeyInvalidatedError extends AppError {
  public readonly key: string;

  constructor(key: string) {
    super('Analysis was invalidated while in progress, retry the request', 'KEY_INVALIDATED', 409);
    this.name = 'KeyInvalidatedError';
    this.key = key;
  }
}

/**
 * The broadcast hub is draining or closed and accepts no new subscribers
 */
export class HubUnavailableError extends AppError {
  constructor(state: string) {
    super(`Broadcast hub is ${state}`, 'HUB_UNAVAILABLE', 503);
    this.name = 'HubUnavailableError';
  }
}

/**
 * The subscriber registry is at capacity
 */
export class SubscriberLimitError extends AppError {
  public readonly limit: number;

  constructor(limit: number) {
    super(`Subscriber limit of ${limit} reached`, 'SUBSCRIBER_LIMIT', 503);
    this.name = 'SubscriberLimitError';
    this.limit = limit;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
