/**
 * Centralized error type definitions for the Basecamp connector
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  REMOTE_HTTP_ERROR = 'REMOTE_HTTP_ERROR',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  MALFORMED_RECORD = 'MALFORMED_RECORD',
  TIMESTAMP_PARSE_ERROR = 'TIMESTAMP_PARSE_ERROR',
  UNIT_TIMEOUT = 'UNIT_TIMEOUT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Non-success HTTP response or transport failure while talking to Basecamp.
 * `status` is absent when no response was received.
 */
export class RemoteHttpError extends AppError {
  public readonly status?: number;

  constructor(
    message: string,
    context: { method: string; url: string; status?: number },
    cause?: unknown
  ) {
    super(message, ErrorCode.REMOTE_HTTP_ERROR, 502, true, context, cause);
    this.status = context.status;
  }
}

export class InvalidConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, ErrorCode.INVALID_CONFIGURATION, 400, true, context, cause);
  }
}

export class MalformedRecordError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.MALFORMED_RECORD, 422, true, context);
  }
}

export class TimestampParseError extends AppError {
  public readonly value: string;

  constructor(value: string, context?: Record<string, unknown>) {
    super(
      `Timestamp '${value}' does not match YYYY-MM-DDTHH:MM:SS.ffffff±HH:MM`,
      ErrorCode.TIMESTAMP_PARSE_ERROR,
      422,
      true,
      { value, ...context }
    );
    this.value = value;
  }
}

export class UnitTimeoutError extends AppError {
  constructor(unit: string, timeoutMs: number, cause?: unknown) {
    super(
      `Processing unit '${unit}' exceeded its ${timeoutMs}ms deadline`,
      ErrorCode.UNIT_TIMEOUT,
      504,
      true,
      { unit, timeoutMs },
      cause
    );
  }
}

/**
 * Errors that invalidate a single record rather than the whole unit of work
 */
export type RecordError = MalformedRecordError | TimestampParseError;

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isRecordError(error: unknown): error is RecordError {
  return error instanceof MalformedRecordError || error instanceof TimestampParseError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, 500, false, undefined, error);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, 500, false, { thrown: String(error) });
}
