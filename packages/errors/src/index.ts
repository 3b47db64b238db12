/**
 * @fileoverview Error taxonomy for the Trellis client
 * @module @trellis/errors
 *
 * Every failure the client surfaces is a `TrellisError`, so callers can
 * branch on `code` or `instanceof` and decide on retry/backoff themselves.
 * The library itself never retries.
 *
 * @example
 * ```typescript
 * import { isTrellisError, InvalidAccessTokenError } from '@trellis/errors';
 *
 * try {
 *   await client.get('/members/me');
 * } catch (error) {
 *   if (error instanceof InvalidAccessTokenError) {
 *     // ask the user for a fresh token
 *   } else if (isTrellisError(error) && error.retryable) {
 *     // schedule a retry
 *   }
 * }
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Machine-readable error codes.
 */
export const ErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_ACCESS_TOKEN: 'INVALID_ACCESS_TOKEN',
  API_ERROR: 'API_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMITED: 'RATE_LIMITED',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  NOT_SAVED: 'NOT_SAVED',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * Error code type
 */
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Longest body fragment kept on an API error. */
const MAX_BODY_FRAGMENT = 500;

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Options accepted by every Trellis error.
 */
export interface TrellisErrorOptions {
  /** HTTP status code, when the error came from a response */
  statusCode?: number;
  /** Additional structured details */
  details?: Record<string, unknown>;
  /** Whether repeating the call could succeed (default: false) */
  retryable?: boolean;
  /** Underlying error */
  cause?: unknown;
}

/**
 * Base error for all Trellis errors.
 */
export class TrellisError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /**
   * Whether repeating the same call could succeed.
   * Advisory only: the client performs no retries.
   */
  readonly retryable: boolean;

  /** Timestamp when the error occurred */
  readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, options: TrellisErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TrellisError';
    this.code = code;
    this.statusCode = options.statusCode;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.timestamp = new Date();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a JSON-serializable object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

// ============================================================================
// Local Errors
// ============================================================================

/**
 * Raised when the client cannot be used as configured: no usable transport,
 * an unknown transport name, or credentials missing for the call.
 * Always raised before a request leaves the process.
 */
export class ConfigurationError extends TrellisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, { details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when an entity needs a server id it does not have yet.
 */
export class NotSavedError extends TrellisError {
  /** Entity type name, e.g. `Card` */
  readonly entity: string;

  constructor(entity: string, operation: string) {
    super(`Cannot ${operation} a ${entity} that has not been saved`, ErrorCodes.NOT_SAVED, {
      details: { entity, operation },
    });
    this.name = 'NotSavedError';
    this.entity = entity;
  }
}

/**
 * Raised when a payload or attribute does not fit its entity schema.
 */
export class ValidationError extends TrellisError {
  /** Field-specific errors */
  readonly fieldErrors: Record<string, string[]>;

  constructor(message: string = 'Validation failed', fieldErrors: Record<string, string[]> = {}) {
    super(message, ErrorCodes.VALIDATION_ERROR, { details: { fieldErrors } });
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  /**
   * Get errors for a specific field.
   */
  getFieldErrors(field: string): string[] {
    return this.fieldErrors[field] ?? [];
  }
}

// ============================================================================
// Remote Errors
// ============================================================================

/**
 * Any non-2xx response. Carries the status and a fragment of the body.
 * 5xx responses are flagged retryable, 4xx are not.
 */
export class ApiError extends TrellisError {
  /** Truncated response body */
  readonly body: string;

  constructor(
    statusCode: number,
    message: string,
    body: string = '',
    options: Omit<TrellisErrorOptions, 'statusCode'> & { code?: ErrorCode } = {},
  ) {
    const fragment = truncate(body);
    super(message, options.code ?? ErrorCodes.API_ERROR, {
      ...options,
      statusCode,
      retryable: options.retryable ?? statusCode >= 500,
      details: { ...options.details, body: fragment },
    });
    this.name = 'ApiError';
    this.body = fragment;
  }
}

/**
 * A 404, or a has-one association that resolved to nothing.
 */
export class NotFoundError extends ApiError {
  /** What was looked up */
  readonly resource: string;

  constructor(resource: string = 'Resource', body: string = '') {
    super(404, `${resource} not found`, body, {
      code: ErrorCodes.NOT_FOUND,
      details: { resource },
    });
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

/**
 * HTTP 429.
 */
export class RateLimitError extends ApiError {
  /** Suggested delay before the next call, if the server sent one */
  readonly retryAfterMs?: number;

  constructor(retryAfterMs?: number, body: string = '') {
    super(429, 'Rate limit exceeded', body, {
      code: ErrorCodes.RATE_LIMITED,
      retryable: true,
      details: { retryAfterMs },
    });
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * The server rejected the credentials (HTTP 401). Distinct from
 * {@link ConfigurationError}: credentials were present but refused.
 */
export class InvalidAccessTokenError extends TrellisError {
  constructor(message: string = 'Invalid or expired access token', body: string = '') {
    super(message, ErrorCodes.INVALID_ACCESS_TOKEN, {
      statusCode: 401,
      details: { body: truncate(body) },
    });
    this.name = 'InvalidAccessTokenError';
  }
}

/**
 * Why a request never produced a response.
 */
export type TransportFailure = 'timeout' | 'network' | 'unknown';

/**
 * Network-level failure: timeout, refused connection, DNS.
 */
export class TransportError extends TrellisError {
  readonly reason: TransportFailure;

  constructor(message: string, reason: TransportFailure = 'unknown', cause?: unknown) {
    super(message, ErrorCodes.TRANSPORT_ERROR, {
      retryable: true,
      details: { reason },
      cause,
    });
    this.name = 'TransportError';
    this.reason = reason;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard to check if an error is a TrellisError.
 */
export function isTrellisError(error: unknown): error is TrellisError {
  return error instanceof TrellisError;
}

/**
 * Create the typed error for a non-2xx status.
 *
 * @param statusCode - HTTP status code
 * @param resource - What was requested, e.g. `GET /boards/abc`
 * @param body - Raw response body
 * @param retryAfterMs - Parsed Retry-After, used for 429
 */
export function fromStatusCode(
  statusCode: number,
  resource: string,
  body: string = '',
  retryAfterMs?: number,
): TrellisError {
  switch (statusCode) {
    case 401:
      return new InvalidAccessTokenError(`Invalid or expired access token for ${resource}`, body);
    case 404:
      return new NotFoundError(resource, body);
    case 429:
      return new RateLimitError(retryAfterMs, body);
    default:
      return new ApiError(statusCode, `Trello responded ${statusCode} to ${resource}`, body);
  }
}

function truncate(body: string): string {
  return body.length > MAX_BODY_FRAGMENT ? `${body.slice(0, MAX_BODY_FRAGMENT)}…` : body;
}
