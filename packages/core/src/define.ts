/**
 * Record type factories
 */

import { RECORD_FLAVORS } from '@recordsmith/shared';
import { IndexableRecord } from './indexable-record';
import { NamedValues } from './named';
import { ObjectRecord } from './object-record';
import { schemaRegistry } from './registry';
import { createSchema, fieldListOf } from './schema';
import type {
  DefineAnyOptions,
  DefineOptions,
  FieldSpec,
  FieldsOf,
  IndexableRecordClass,
  NamedInput,
  ObjectRecordClass,
  RecordSchema
} from './types';

/**
 * Every member name reachable from a prototype, up to and including
 * Object.prototype
 */
function memberNames(prototype: object): Set<string> {
  const names = new Set<string>();
  for (let current: object | null = prototype; current; current = Object.getPrototypeOf(current)) {
    for (const name of Object.getOwnPropertyNames(current)) {
      names.add(name);
    }
  }
  return names;
}

const RESERVED_NAMES = {
  [RECORD_FLAVORS.INDEXABLE]: memberNames(IndexableRecord.prototype),
  [RECORD_FLAVORS.OBJECT]: memberNames(ObjectRecord.prototype)
};

function buildIndexableClass<Field extends string>(
  schema: RecordSchema<Field>
): IndexableRecordClass<Field> {
  class GeneratedRecord extends IndexableRecord<Field> {
    static readonly schema = schema;

    constructor(...values: unknown[]) {
      super(schema, values);
      // Subclasses may still add members of their own
      if (new.target === GeneratedRecord) Object.preventExtensions(this);
    }

    static from<T>(
      this: new (...values: unknown[]) => T,
      positional: readonly unknown[] = [],
      namedValues: NamedInput<Field> = {}
    ): T {
      return new this(...positional, new NamedValues(namedValues));
    }

    static of<T>(this: new (...values: unknown[]) => T, namedValues: NamedInput<Field>): T {
      return new this(new NamedValues(namedValues));
    }
  }

  Object.defineProperty(GeneratedRecord, 'name', { value: schema.name });

  // Field accessors are installed on each instance at runtime, so the class
  // type is widened here to include them.
  return GeneratedRecord as IndexableRecordClass<Field>;
}

function buildObjectClass<Field extends string>(schema: RecordSchema<Field>): ObjectRecordClass<Field> {
  class GeneratedRecord extends ObjectRecord<Field> {
    static readonly schema = schema;

    constructor(...values: unknown[]) {
      super(schema, values);
      if (new.target === GeneratedRecord) Object.preventExtensions(this);
    }

    static from<T>(
      this: new (...values: unknown[]) => T,
      positional: readonly unknown[] = [],
      namedValues: NamedInput<Field> = {}
    ): T {
      return new this(...positional, new NamedValues(namedValues));
    }

    static of<T>(this: new (...values: unknown[]) => T, namedValues: NamedInput<Field>): T {
      return new this(new NamedValues(namedValues));
    }
  }

  Object.defineProperty(GeneratedRecord, 'name', { value: schema.name });

  return GeneratedRecord as ObjectRecordClass<Field>;
}

/**
 * Define an indexable record type: fields are reachable by name, by index and
 * by slice, and instances are iterable.
 *
 * @example
 * ```typescript
 * const Options = defineRecord('Options', 'maxcolors shape zoom restore');
 * const options = new Options(5, 'square', 0.9, true);
 * options.maxcolors = 7;
 * options.setAt(-1, false);
 * options.describe(); // "Options(maxcolors=7, shape='square', zoom=0.9, restore=false)"
 * ```
 *
 * @param fields - Field names, or one space-separated string of them
 */
export function defineRecord<const Names extends FieldSpec>(
  name: string,
  fields: Names,
  options: DefineOptions<FieldsOf<Names>> = {}
): IndexableRecordClass<FieldsOf<Names>> {
  const schema = createSchema(
    name,
    fieldListOf(fields),
    options,
    RECORD_FLAVORS.INDEXABLE,
    RESERVED_NAMES[RECORD_FLAVORS.INDEXABLE]
  );
  schemaRegistry.register(schema);
  return buildIndexableClass(schema);
}

/**
 * Define an object record type: fields are reachable by name only, with an
 * explicit `toTuple()` in place of iteration.
 */
export function defineObject<const Names extends FieldSpec>(
  name: string,
  fields: Names,
  options: DefineOptions<FieldsOf<Names>> = {}
): ObjectRecordClass<FieldsOf<Names>> {
  const schema = createSchema(
    name,
    fieldListOf(fields),
    options,
    RECORD_FLAVORS.OBJECT,
    RESERVED_NAMES[RECORD_FLAVORS.OBJECT]
  );
  schemaRegistry.register(schema);
  return buildObjectClass(schema);
}

/**
 * Define a record type, choosing the flavor with `indexable` (default true)
 */
export function define<const Names extends FieldSpec>(
  name: string,
  fields: Names,
  options: DefineOptions<FieldsOf<Names>> & { indexable: false }
): ObjectRecordClass<FieldsOf<Names>>;

export function define<const Names extends FieldSpec>(
  name: string,
  fields: Names,
  options?: DefineOptions<FieldsOf<Names>> & { indexable?: true }
): IndexableRecordClass<FieldsOf<Names>>;

export function define<const Names extends FieldSpec>(
  name: string,
  fields: Names,
  options?: DefineAnyOptions<FieldsOf<Names>>
): IndexableRecordClass<FieldsOf<Names>> | ObjectRecordClass<FieldsOf<Names>>;

export function define<const Names extends FieldSpec>(
  name: string,
  fields: Names,
  options: DefineAnyOptions<FieldsOf<Names>> = {}
): IndexableRecordClass<FieldsOf<Names>> | ObjectRecordClass<FieldsOf<Names>> {
  const { indexable = true, ...rest } = options;
  return indexable ? defineRecord(name, fields, rest) : defineObject(name, fields, rest);
}
