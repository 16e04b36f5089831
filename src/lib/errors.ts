/**
 * Custom error hierarchy for mailrecall.
 *
 * Provides programmatic error discrimination without parsing message strings.
 * Each subclass carries a `code` string for structured error handling.
 */

/** Base error for all mailrecall errors. Carries a `code` and optional `context`. */
export class MailRecallError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string = 'MAILRECALL_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = 'MailRecallError';
    this.code = code;
    this.context = context;
  }
}

/** Configuration errors: invalid config values, missing required settings. */
export class ConfigError extends MailRecallError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** Storage/database errors: connection failures, query errors, constraint violations. */
export class StorageError extends MailRecallError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', context);
    this.name = 'StorageError';
  }
}

/** Validation errors: bad input, precondition failures, argument checks. */
export class ValidationError extends MailRecallError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', context);
    this.name = 'ValidationError';
  }
}

/** Network/API errors: HTTP failures, timeouts, API response errors. */
export class NetworkError extends MailRecallError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, context?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', context);
    this.name = 'NetworkError';
    this.statusCode = statusCode;
  }
}

/** Resource not found: records, source files. */
export class NotFoundError extends MailRecallError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
  }
}

/** The mail source could not be reached at all. Aborts the whole run. */
export class FetchError extends MailRecallError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', context);
    this.name = 'FetchError';
  }
}

export type TransformStage = 'fetch' | 'normalize' | 'summarize' | 'embed';

/** A single message could not be turned into a storable record. */
export class TransformError extends MailRecallError {
  readonly stage: TransformStage;

  constructor(message: string, stage: TransformStage, context?: Record<string, unknown>) {
    super(message, 'TRANSFORM_ERROR', context);
    this.name = 'TransformError';
    this.stage = stage;
  }
}

/** A vector does not have the dimension the store was created with. */
export class DimensionMismatchError extends MailRecallError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context?: Record<string, unknown>) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
      'DIMENSION_MISMATCH',
      { ...context, expected, actual }
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** An ingestion run was started while another one was still in progress. */
export class RunInProgressError extends MailRecallError {
  constructor(context?: Record<string, unknown>) {
    super('An ingestion run is already in progress', 'RUN_IN_PROGRESS', context);
    this.name = 'RunInProgressError';
  }
}

/** Type guard: check if an error is a MailRecallError or subclass. */
export function isMailRecallError(error: unknown): error is MailRecallError {
  return error instanceof MailRecallError;
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
