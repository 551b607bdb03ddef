/**
 * @fileoverview Shared error classes for tasklink
 * @module @tasklink/errors
 *
 * One hierarchy for every failure the toolkit can surface: local pre-flight
 * rejections, programmer errors in the endpoint catalog, and ClickUp API
 * failures classified from their `ECODE`.
 *
 * @example
 * ```typescript
 * import { AuthError, ValidationError, isApiError } from '@tasklink/errors';
 *
 * throw new ValidationError('Invalid input', {
 *   assignees: ['must contain at least 2 elements'],
 * });
 *
 * try {
 *   await client.getTask('abc');
 * } catch (error) {
 *   if (isApiError(error) && error.kind === 'auth') {
 *     console.log(error.ecode, error.httpStatus);
 *   }
 * }
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Machine-readable codes, one per error class.
 */
export const ErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTH_ERROR: 'AUTH_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  SERVER_ERROR: 'SERVER_ERROR',
  PLAN_RESTRICTION: 'PLAN_RESTRICTION',
  TIMEOUT: 'TIMEOUT',
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/**
 * Error code type
 */
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Stable classification of a failure, independent of ClickUp's own codes.
 */
export type ErrorKind =
  | 'configuration'
  | 'unknown_operation'
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'server'
  | 'plan_restriction'
  | 'timeout'
  | 'unknown'
  | 'internal';

/**
 * Statuses the server answers with when rendering an error.
 */
export type ErrorStatusCode = 400 | 401 | 402 | 404 | 500 | 502 | 504;

/**
 * Serialized form of an error.
 */
export interface ErrorPayload {
  code: ErrorCode;
  kind: ErrorKind;
  message: string;
  ecode?: string;
  httpStatus?: number;
  details?: Record<string, unknown>;
  timestamp: string;
  stack?: string;
  requestId?: string;
}

/**
 * Upstream context carried by errors that came back from ClickUp.
 */
export interface UpstreamErrorOptions {
  /** ClickUp `ECODE`, preserved verbatim */
  ecode?: string;
  /** HTTP status returned by ClickUp */
  httpStatus?: number;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Underlying cause */
  cause?: unknown;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error for all tasklink errors.
 *
 * - `statusCode` is the status the re-exposition server answers with
 * - `httpStatus` is the status ClickUp answered with, when there was one
 */
export class TaskLinkError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Taxonomy kind */
  readonly kind: ErrorKind;

  /** HTTP status code used when the error is rendered by the server */
  readonly statusCode: ErrorStatusCode;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** ClickUp error code, when the error came from the API */
  readonly ecode?: string;

  /** Upstream HTTP status, when the error came from the API */
  readonly httpStatus?: number;

  /** Whether an idempotent request that failed this way may be retried */
  readonly retryable: boolean;

  /**
   * Whether this error is operational (expected) vs a programming error.
   * Configuration and catalog errors are programming errors.
   */
  readonly isOperational: boolean;

  /** Timestamp when the error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    kind: ErrorKind,
    statusCode: ErrorStatusCode,
    options: UpstreamErrorOptions & { retryable?: boolean; isOperational?: boolean } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TaskLinkError';
    this.code = code;
    this.kind = kind;
    this.statusCode = statusCode;
    this.details = options.details;
    this.ecode = options.ecode;
    this.httpStatus = options.httpStatus;
    this.retryable = options.retryable ?? false;
    this.isOperational = options.isOperational ?? true;
    this.timestamp = new Date();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Flat error payload, as nested under `error` in API responses.
   */
  toPayload(): ErrorPayload {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      ecode: this.ecode,
      httpStatus: this.httpStatus,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Convert to JSON-serializable object for API responses.
   */
  toJSON(): { error: ErrorPayload } {
    return { error: this.toPayload() };
  }
}

// ============================================================================
// Programmer Errors
// ============================================================================

/**
 * Configuration error (HTTP 500).
 * Missing token, unresolved path placeholder, invalid environment.
 */
export class ConfigurationError extends TaskLinkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, 'configuration', 500, {
      details,
      isOperational: false,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Unknown operation error (HTTP 404).
 * Thrown when an operation name is not in the endpoint catalog.
 */
export class UnknownOperationError extends TaskLinkError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Unknown operation '${operation}'`, ErrorCodes.UNKNOWN_OPERATION, 'unknown_operation', 404, {
      details: { operation },
    });
    this.name = 'UnknownOperationError';
    this.operation = operation;
  }
}

// ============================================================================
// API Errors
// ============================================================================

/**
 * Validation error (HTTP 400).
 * Raised by local pre-flight checks, or classified from a ClickUp rejection.
 */
export class ValidationError extends TaskLinkError {
  /** Field-specific errors */
  readonly fieldErrors: Record<string, string[]>;

  constructor(
    message: string = 'Validation failed',
    fieldErrors: Record<string, string[]> = {},
    options: UpstreamErrorOptions = {},
  ) {
    super(message, ErrorCodes.VALIDATION_ERROR, 'validation', 400, {
      ...options,
      details: { ...options.details, fieldErrors },
    });
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  /**
   * Check if a specific field has errors.
   */
  hasFieldError(field: string): boolean {
    return (this.fieldErrors[field]?.length ?? 0) > 0;
  }

  /**
   * Get errors for a specific field.
   */
  getFieldErrors(field: string): string[] {
    return this.fieldErrors[field] ?? [];
  }
}

/**
 * Authentication error (HTTP 401).
 * Missing or insufficient token.
 */
export class AuthError extends TaskLinkError {
  constructor(message: string = 'Authentication failed', options: UpstreamErrorOptions = {}) {
    super(message, ErrorCodes.AUTH_ERROR, 'auth', 401, options);
    this.name = 'AuthError';
  }
}

/**
 * Not found error (HTTP 404).
 * Entity or route absent.
 */
export class NotFoundError extends TaskLinkError {
  constructor(message: string = 'Resource not found', options: UpstreamErrorOptions = {}) {
    super(message, ErrorCodes.NOT_FOUND, 'not_found', 404, options);
    this.name = 'NotFoundError';
  }
}

/**
 * Upstream server error (HTTP 502).
 * The only retryable kind, and only for idempotent reads.
 */
export class ServerError extends TaskLinkError {
  constructor(message: string = 'ClickUp server error', options: UpstreamErrorOptions = {}) {
    super(message, ErrorCodes.SERVER_ERROR, 'server', 502, { ...options, retryable: true });
    this.name = 'ServerError';
  }
}

/**
 * Plan restriction error (HTTP 402).
 * The workspace plan does not include the requested feature.
 */
export class PlanRestrictionError extends TaskLinkError {
  constructor(message: string = 'Not available on this plan', options: UpstreamErrorOptions = {}) {
    super(message, ErrorCodes.PLAN_RESTRICTION, 'plan_restriction', 402, options);
    this.name = 'PlanRestrictionError';
  }
}

/**
 * Timeout error (HTTP 504).
 * The caller cancelled or the request exceeded its deadline.
 */
export class TimeoutError extends TaskLinkError {
  constructor(message: string = 'Request timed out', options: UpstreamErrorOptions = {}) {
    super(message, ErrorCodes.TIMEOUT, 'timeout', 504, options);
    this.name = 'TimeoutError';
  }
}

/**
 * Unknown error (HTTP 502).
 * Unrecognised ECODE or unparsable error body; the raw body is kept in
 * `details.body` for diagnostics.
 */
export class UnknownError extends TaskLinkError {
  constructor(message: string = 'Unknown ClickUp error', options: UpstreamErrorOptions = {}) {
    super(message, ErrorCodes.UNKNOWN_ERROR, 'unknown', 502, options);
    this.name = 'UnknownError';
  }
}

/**
 * Internal error (HTTP 500).
 * Wraps anything that is not a tasklink error.
 */
export class InternalError extends TaskLinkError {
  constructor(message: string = 'Internal server error', details?: Record<string, unknown>) {
    super(message, ErrorCodes.INTERNAL_ERROR, 'internal', 500, { details, isOperational: false });
    this.name = 'InternalError';
  }
}

/**
 * Errors that describe the outcome of a ClickUp call.
 */
export type ApiError =
  | AuthError
  | ValidationError
  | NotFoundError
  | ServerError
  | PlanRestrictionError
  | TimeoutError
  | UnknownError;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard to check if an error is a TaskLinkError.
 *
 * @param error - The error to check
 * @returns True if the error is a TaskLinkError instance
 */
export function isTaskLinkError(error: unknown): error is TaskLinkError {
  return error instanceof TaskLinkError;
}

/**
 * Type guard for errors that a compound operation reports instead of throwing.
 */
export function isApiError(error: unknown): error is ApiError {
  return (
    error instanceof AuthError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof ServerError ||
    error instanceof PlanRestrictionError ||
    error instanceof TimeoutError ||
    error instanceof UnknownError
  );
}

/**
 * Wrap an unknown error into a TaskLinkError.
 *
 * @param error - The error to wrap
 * @returns A TaskLinkError instance
 */
export function wrapError(error: unknown): TaskLinkError {
  if (isTaskLinkError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, {
      originalError: error.name,
    });
  }

  if (typeof error === 'string') {
    return new InternalError(error);
  }

  return new InternalError('An unknown error occurred', {
    originalValue: String(error),
  });
}

/**
 * Create an error response object suitable for HTTP responses.
 *
 * @param error - The TaskLinkError to convert
 * @returns Object with statusCode and body
 */
export function createErrorResponse(error: TaskLinkError): {
  statusCode: ErrorStatusCode;
  body: { error: ErrorPayload };
} {
  return {
    statusCode: error.statusCode,
    body: error.toJSON(),
  };
}
