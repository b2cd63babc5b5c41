/**
 * Error types raised by record schemas and record instances
 */

import { ERROR_CODES, type ErrorCode } from './constants';

/**
 * Context attached to every record error
 */
export interface RecordErrorDetails {
  record?: string;
  field?: string;
  value?: unknown;
  index?: number;
  length?: number;
  expected?: number;
  received?: number;
  issues?: unknown;
}

export class RecordError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public details: RecordErrorDetails = {}
  ) {
    super(message);
    this.name = 'RecordError';
  }
}

/**
 * Malformed schema definition (no fields, duplicates, bad defaults, ...)
 */
export class ConfigurationError extends RecordError {
  constructor(message: string, details?: RecordErrorDetails) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * More values supplied than the record has fields
 */
export class ArityError extends RecordError {
  constructor(record: string, expected: number, received: number) {
    super(
      ERROR_CODES.ARITY_ERROR,
      `${record} accepts up to ${expected} values; got ${received}`,
      { record, expected, received }
    );
    this.name = 'ArityError';
  }
}

export class UnknownFieldError extends RecordError {
  constructor(record: string, field: string) {
    super(ERROR_CODES.UNKNOWN_FIELD, `${record} does not have a ${field} field`, {
      record,
      field
    });
    this.name = 'UnknownFieldError';
  }
}

export class IndexError extends RecordError {
  constructor(message: string, details?: RecordErrorDetails) {
    super(ERROR_CODES.INDEX_OUT_OF_RANGE, message, details);
    this.name = 'IndexError';
  }
}

/**
 * Thrown by validators to reject a candidate value
 */
export class ValidationError extends RecordError {
  constructor(message: string, details?: RecordErrorDetails) {
    super(ERROR_CODES.VALIDATION_ERROR, message, details);
    this.name = 'ValidationError';
  }
}

export class OperationNotSupportedError extends RecordError {
  constructor(message: string, details?: RecordErrorDetails) {
    super(ERROR_CODES.OPERATION_NOT_SUPPORTED, message, details);
    this.name = 'OperationNotSupportedError';
  }
}

/**
 * Type guard for errors raised by this package
 */
export function isRecordError(error: unknown): error is RecordError {
  return error instanceof RecordError;
}
