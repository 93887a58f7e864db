/**
 * Custom error classes for the application
 * Every error carries a stable code so callers can branch without parsing messages
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
   * Get safe error details (no sensitive info)
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
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Data source error (file missing, unreadable, etc.)
 */
export class DataSourceError extends AppError {
  public readonly source: string;
  public readonly originalError: Error | undefined;

  constructor(source: string, message: string, originalError?: Error) {
    super(`${source}: ${message}`, 'DATA_SOURCE_ERROR', 502);
    this.name = 'DataSourceError';
    this.source = source;
    this.originalError = originalError;
  }
}

// ============================================================================
// TABLE ERRORS - Raised by the inflammation statistics
// ============================================================================

/**
 * Input is not a numeric table
 */
export class InvalidTableTypeError extends AppError {
  constructor(message = 'data input should be a numeric table') {
    super(message, 'INVALID_TABLE_TYPE', 400);
    this.name = 'InvalidTableTypeError';
  }
}

/**
 * Input is not a rectangular 2-dimensional table
 */
export class TableShapeError extends AppError {
  constructor(message = 'inflammation array should be 2-dimensional') {
    super(message, 'INVALID_TABLE_SHAPE', 400);
    this.name = 'TableShapeError';
  }
}

/**
 * Table holds a value outside the allowed domain
 */
export class NegativeValueError extends AppError {
  public readonly row: number;
  public readonly col: number;

  constructor(row: number, col: number) {
    super('Inflammation values should not be negative', 'NEGATIVE_VALUE', 400);
    this.name = 'NegativeValueError';
    this.row = row;
    this.col = col;
  }
}

/**
 * Index out of range (patient row, or "no observations yet")
 */
export class IndexOutOfRangeError extends AppError {
  public readonly index: number;
  public readonly length: number;

  constructor(message: string, index: number, length: number) {
    super(message, 'INDEX_OUT_OF_RANGE', 404);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Errors the inflammation statistics can raise
 */
export type InflammationError =
  | InvalidTableTypeError
  | TableShapeError
  | NegativeValueError
  | IndexOutOfRangeError;

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Check if an error is one of the inflammation table errors
 */
export function isInflammationError(error: unknown): error is InflammationError {
  return (
    error instanceof InvalidTableTypeError ||
    error instanceof TableShapeError ||
    error instanceof NegativeValueError ||
    error instanceof IndexOutOfRangeError
  );
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
