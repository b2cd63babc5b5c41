/**
 * @recordsmith/core
 *
 * Record type factory: named, mutable, fixed-field records with defaults and
 * validated writes, in an indexable flavor and an object flavor.
 *
 * @example
 * ```typescript
 * import { defineRecord, named } from '@recordsmith/core';
 *
 * const Rgb = defineRecord('Rgb', 'red green blue', { defaults: [0, 0, 0] });
 * const navy = new Rgb(named({ blue: 128 }));
 * navy.toDict(); // { red: 0, green: 0, blue: 128 }
 * ```
 */

// Factories
export { defineRecord, defineObject, define } from './define';

// Record classes
export { BaseRecord } from './base-record';
export { IndexableRecord } from './indexable-record';
export { ObjectRecord } from './object-record';

// Construction helpers
export { NamedValues, named } from './named';

// Schema registry
export { SchemaRegistry, schemaRegistry } from './registry';

// Free-function operations
export * as records from './operations';
export { isIndexable } from './operations';
export type { AnyRecord } from './operations';

// Types
export type {
  FieldSpec,
  SplitFields,
  FieldsOf,
  RecordSchema,
  DefineOptions,
  DefineAnyOptions,
  FieldAccessors,
  NamedInput,
  IndexableRecordOf,
  ObjectRecordOf,
  RecordClass,
  IndexableRecordClass,
  ObjectRecordClass
} from './types';

// Errors, validators and the version string
export {
  VERSION,
  RecordError,
  ConfigurationError,
  ArityError,
  UnknownFieldError,
  IndexError,
  ValidationError,
  OperationNotSupportedError,
  isRecordError,
  fieldValidator
} from '@recordsmith/shared';
export type { FieldValidator, FieldSchemas } from '@recordsmith/shared';
