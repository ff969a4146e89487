/**
 * Error types and codes for downloads-tidy.
 * This is the error contract - all thrown errors should extend TidyError.
 */

/**
 * Base error class for all downloads-tidy errors.
 */
export class TidyError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TidyError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends TidyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (missing directories, parse errors, filesystem failures).
 */
export class SystemError extends TidyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Undo record errors (lookup, state, shape).
 */
export class TransactionError extends TidyError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TransactionError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  CONFIG_INVALID_RULE: 'CONFIG_INVALID_RULE',
  SCHEMA_INVALID: 'SCHEMA_INVALID',

  // System
  PARSE_ERROR: 'PARSE_ERROR',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  MOVE_FAILED: 'MOVE_FAILED',
  STATS_WRITE_FAILED: 'STATS_WRITE_FAILED',

  // Undo records
  TX_NOT_FOUND: 'TX_NOT_FOUND',
  TX_ALREADY_UNDONE: 'TX_ALREADY_UNDONE',
  TX_MALFORMED: 'TX_MALFORMED',
  TX_SELECTOR_REQUIRED: 'TX_SELECTOR_REQUIRED',
  UNDO_SOURCE_MISSING: 'UNDO_SOURCE_MISSING',
  UNDO_MOVE_FAILED: 'UNDO_MOVE_FAILED',
  UNDO_ENTRY_INVALID: 'UNDO_ENTRY_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Outcome of an operation that may fail without aborting its batch.
 */
export type Result<T, E extends TidyError = TidyError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends TidyError>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Fatal errors abort a command before any mutation and map to exit code 2.
 */
export function isFatalError(error: unknown): error is TidyError {
  return error instanceof ConfigError || error instanceof TransactionError ||
    (error instanceof SystemError && error.code === ErrorCodes.SOURCE_NOT_FOUND);
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
