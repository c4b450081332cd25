/**
 * APPLICATION ERROR CLASSES
 * =========================
 *
 * Every error that crosses a module boundary extends AppError so the HTTP
 * layer can map it to a status code and a stable error code.
 *
 * Rejections the validator produces (unsupported tool, access denied,
 * invalid arguments) and empty results are values, not exceptions; see
 * server/tools/types.ts.
 *
 * USAGE:
 * ```ts
 * throw new NotFoundError('Conversation not found', { conversationId });
 * throw new DataSourceError('Rating histogram query failed', { cause });
 * ```
 */

export type ErrorContext = Record<string, unknown>;

export abstract class AppError extends Error {
  abstract get statusCode(): number;
  abstract get code(): string;
  readonly context?: ErrorContext;
  readonly isOperational: boolean = true; // Expected errors vs programming errors

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

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
 * 401 Unauthorized - Authentication required
 */
export class UnauthorizedError extends AppError {
  get statusCode() { return 401; }
  get code() { return 'UNAUTHORIZED'; }
}

/**
 * 403 Forbidden - Insufficient permissions
 */
export class ForbiddenError extends AppError {
  get statusCode() { return 403; }
  get code() { return 'FORBIDDEN'; }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  get statusCode() { return 404; }
  get code() { return 'NOT_FOUND'; }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  get statusCode() { return 500; }
  get code() { return 'INTERNAL_ERROR'; }
  readonly isOperational: boolean = false;
}

/**
 * 503 Service Unavailable - External service down
 */
export class ServiceUnavailableError extends AppError {
  get statusCode() { return 503; }
  get code() { return 'SERVICE_UNAVAILABLE'; }
}

/**
 * 504 Gateway Timeout - External service timeout
 */
export class TimeoutError extends AppError {
  get statusCode() { return 504; }
  get code() { return 'TIMEOUT'; }

  constructor(message: string, readonly timeoutMs: number, readonly operation: string) {
    super(message, { timeoutMs, operation });
  }
}

/**
 * Interpreter errors
 */
export class InterpreterTransientError extends ServiceUnavailableError {
  get code() { return 'INTERPRETER_TRANSIENT'; }
}

export class InterpreterRequestError extends InternalError {
  get code() { return 'INTERPRETER_REQUEST_FAILED'; }
  readonly isOperational: boolean = true;
}

/**
 * Data layer errors - fatal for the turn, never mapped to a fallback tool
 */
export class DataSourceError extends InternalError {
  get code() { return 'DATA_SOURCE_ERROR'; }
}

/**
 * Turn errors surfaced to the caller
 */
export class TurnFailedError extends ServiceUnavailableError {
  get code() { return 'TURN_FAILED'; }

  constructor(readonly traceId: number | null) {
    super("We couldn't complete that request. Please try again later.");
  }
}

export class TurnCancelledError extends AppError {
  get statusCode() { return 499; }
  get code() { return 'TURN_CANCELLED'; }
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
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
