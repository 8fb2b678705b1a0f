/**
 * APPLICATION ERROR CLASSES
 * =========================
 *
 * Error hierarchy shared by the HTTP layer and the watchdog.
 *
 * HTTP errors carry a status code and an error code that the error handler
 * middleware serializes. Watchdog errors follow the failure taxonomy:
 *
 * - ConnectionCheckFailure: transient, retried by the recovery action
 * - RecoveryExhaustedError: reported to the status reporter, loop keeps going
 * - ConfigurationError: fatal at startup
 *
 * USAGE:
 * ```ts
 * throw new ConflictError('A check is already running');
 * throw new ConfigurationError('Invalid environment', { issues });
 * ```
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error
 */
export abstract class AppError extends Error {
  abstract get statusCode(): number;
  abstract get code(): string;
  readonly context?: ErrorContext;
  readonly isOperational: boolean = true;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for API response
   */
  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        context: this.context,
      },
    };
  }
}

/**
 * 400 Bad Request - Invalid input/validation
 */
export class ValidationError extends AppError {
  get statusCode() { return 400; }
  get code() { return 'VALIDATION_ERROR'; }
}

/**
 * 401 Unauthorized - Missing or wrong control token
 */
export class UnauthorizedError extends AppError {
  get statusCode() { return 401; }
  get code() { return 'UNAUTHORIZED'; }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  get statusCode() { return 404; }
  get code() { return 'NOT_FOUND'; }
}

/**
 * 409 Conflict - Operation clashes with work in progress
 */
export class ConflictError extends AppError {
  get statusCode() { return 409; }
  get code() { return 'CONFLICT'; }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  get statusCode() { return 500; }
  get code() { return 'INTERNAL_ERROR'; }
  readonly isOperational = false;
}

/**
 * 503 Service Unavailable - Browser session not ready
 */
export class ServiceUnavailableError extends AppError {
  get statusCode() { return 503; }
  get code() { return 'SERVICE_UNAVAILABLE'; }
}

/**
 * 504 Gateway Timeout - Browser operation timed out
 */
export class TimeoutError extends AppError {
  readonly timeoutMs: number;
  readonly operation: string;

  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, { operation, timeoutMs });
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  get statusCode() { return 504; }
  get code() { return 'TIMEOUT'; }
}

/**
 * Watchdog errors
 */
export class ConnectionCheckFailure extends ServiceUnavailableError {
  get code() { return 'CONNECTION_CHECK_FAILED'; }
}

export class RecoveryExhaustedError extends ServiceUnavailableError {
  readonly attempts: number;

  constructor(attempts: number, context?: ErrorContext) {
    super(`Recovery exhausted after ${attempts} attempt(s)`, { attempts, ...context });
    this.attempts = attempts;
  }

  get code() { return 'RECOVERY_EXHAUSTED'; }
}

export class ConfigurationError extends InternalError {
  get code() { return 'CONFIGURATION_ERROR'; }
}

export class BrowserUnavailableError extends ServiceUnavailableError {
  get code() { return 'BROWSER_UNAVAILABLE'; }
}

/**
 * Utility: Check if error is operational (expected) vs programming error
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Utility: Get error message safely
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
