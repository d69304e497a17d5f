/**
 * Application error types
 * Each error type maps to an HTTP status code and names the step that failed
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Missing or unknown caller identity (401 Unauthorized)
 */
export class AuthError extends AppError {
  constructor(message: string) {
    super(message, 'UNAUTHENTICATED', 401);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Probable re-submission of an existing record (409 Conflict).
 * The caller may resubmit the same input with override set.
 */
export class DuplicateRejectedError extends AppError {
  constructor(details: { erx: string; memberId: string; netAmount: string; serviceDate: string }) {
    super(
      'Duplicate check: a record with the same ERX, member ID, net amount and service date already exists',
      'DUPLICATE_REJECTED',
      409,
      details
    );
  }
}

export type StoreErrorKind = 'transient' | 'permanent';

export type StoreErrorReason =
  | 'rate_limited'
  | 'unavailable'
  | 'auth'
  | 'schema'
  | 'not_found'
  | 'unknown';

/**
 * Backing store failures.
 * Transient errors (503) may be retried; permanent errors (502) must not.
 */
export class StoreError extends AppError {
  constructor(
    message: string,
    public readonly kind: StoreErrorKind,
    public readonly reason: StoreErrorReason,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      kind === 'transient' ? 'STORE_UNAVAILABLE' : 'STORE_ERROR',
      kind === 'transient' ? 503 : 502,
      { kind, reason, ...details }
    );
  }

  get transient(): boolean {
    return this.kind === 'transient';
  }
}

/**
 * Audit trail write failed (500). The business write it describes is already committed.
 */
export class LogError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'AUDIT_LOG_ERROR', 500, details);
  }
}

/**
 * Report delivery failed (502). The report can still be downloaded as a file.
 */
export class DeliveryError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DELIVERY_ERROR', 502, details);
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isTransientStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError && error.transient;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
