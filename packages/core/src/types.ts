/**
 * Core types for record schemas and generated record classes
 */

import type { FieldValidator, RecordFlavor } from '@recordsmith/shared';
import type { IndexableRecord } from './indexable-record';
import type { ObjectRecord } from './object-record';

// ============================================
// FIELD LISTS
// ============================================

/**
 * Field names as an array, or as one whitespace-separated string
 */
export type FieldSpec = string | readonly string[];

type TrimSpaces<S extends string> = S extends ` ${infer Rest}`
  ? TrimSpaces<Rest>
  : S extends `${infer Rest} `
    ? TrimSpaces<Rest>
    : S;

/**
 * Type-level split of a space-separated field list.
 *
 * Example:
 *   type Fields = SplitFields<'red green  blue'>;  // ['red', 'green', 'blue']
 */
export type SplitFields<S extends string> =
  TrimSpaces<S> extends ''
    ? []
    : TrimSpaces<S> extends `${infer Head} ${infer Rest}`
      ? [Head, ...SplitFields<Rest>]
      : [TrimSpaces<S>];

/**
 * Union of field names described by a field list.
 * A non-literal string list gives plain `string`.
 */
export type FieldsOf<Names extends FieldSpec> = Names extends string
  ? string extends Names
    ? string
    : SplitFields<Names>[number]
  : Names extends readonly string[]
    ? Names[number]
    : never;

// ============================================
// SCHEMA
// ============================================

/**
 * Immutable definition of a record type
 */
export interface RecordSchema<Field extends string = string> {
  readonly name: string;
  readonly fields: readonly Field[];
  readonly defaults: readonly unknown[];
  readonly flavor: RecordFlavor;
  readonly indexable: boolean;
  /**
   * `name(field1,field2,...)`; records only compare against records with the
   * same fingerprint
   */
  readonly fingerprint: string;
  readonly positions: ReadonlyMap<string, number>;
  validator?(field: Field, value: unknown): unknown;
}

export interface DefineOptions<Field extends string = string> {
  /**
   * Defaults aligned by position with the fields; missing ones are null
   */
  defaults?: readonly unknown[];
  validator?: FieldValidator<Field>;
}

export interface DefineAnyOptions<Field extends string = string> extends DefineOptions<Field> {
  indexable?: boolean;
}

// ============================================
// RECORD CLASSES
// ============================================

export type FieldAccessors<Field extends string> = {
  [K in Field]: unknown;
};

/**
 * Values written by name at construction time
 */
export type NamedInput<Field extends string> = Partial<Record<Field, unknown>>;

export type IndexableRecordOf<Field extends string> = IndexableRecord<Field> & FieldAccessors<Field>;

export type ObjectRecordOf<Field extends string> = ObjectRecord<Field> & FieldAccessors<Field>;

/**
 * A generated record class
 */
export interface RecordClass<Field extends string, Instance> {
  /**
   * Positional values, optionally followed by `named({...})`
   */
  new (...values: unknown[]): Instance;

  readonly schema: RecordSchema<Field>;

  /**
   * Construct from positional values and values by field name
   */
  from<T>(
    this: new (...values: unknown[]) => T,
    positional?: readonly unknown[],
    namedValues?: NamedInput<Field>
  ): T;

  /**
   * Construct from values by field name only
   */
  of<T>(this: new (...values: unknown[]) => T, namedValues: NamedInput<Field>): T;
}

export type IndexableRecordClass<Field extends string> = RecordClass<Field, IndexableRecordOf<Field>>;

export type ObjectRecordClass<Field extends string> = RecordClass<Field, ObjectRecordOf<Field>>;
