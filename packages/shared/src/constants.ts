/**
 * Package-wide constants
 */

export const VERSION = '1.0.0';

// Value stored for a field that got neither an argument nor a default
export const ABSENT = null;

// Prefix for everything written to the console
export const LOG_PREFIX = '[recordsmith]';

// Field names must be plain identifiers so accessors and toDict() keys line up
export const FIELD_NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Error codes
export const ERROR_CODES = {
  // Schema definition errors
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Construction errors
  ARITY_ERROR: 'ARITY_ERROR',

  // Access errors
  UNKNOWN_FIELD: 'UNKNOWN_FIELD',
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  OPERATION_NOT_SUPPORTED: 'OPERATION_NOT_SUPPORTED',

  // Validator rejections
  VALIDATION_ERROR: 'VALIDATION_ERROR'
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// Record flavors
export const RECORD_FLAVORS = {
  INDEXABLE: 'indexable',
  OBJECT: 'object'
} as const;

export type RecordFlavor = (typeof RECORD_FLAVORS)[keyof typeof RECORD_FLAVORS];
