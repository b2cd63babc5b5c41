/**
 * Free-function API over records.
 *
 * Every operation works on either flavor; positional operations check the
 * record's capability first and reject object records.
 */

import { OperationNotSupportedError } from '@recordsmith/shared';
import type { SliceBound } from '@recordsmith/shared';
import { BaseRecord } from './base-record';
import { IndexableRecord } from './indexable-record';
import { NamedValues } from './named';

export type AnyRecord = BaseRecord<string>;

/**
 * Capability check for positional access
 */
export function isIndexable<Field extends string>(
  record: BaseRecord<Field>
): record is IndexableRecord<Field> {
  return record instanceof IndexableRecord;
}

function requireIndexable(record: AnyRecord, operation: string): IndexableRecord<string> {
  if (!isIndexable(record)) {
    throw new OperationNotSupportedError(
      `${record.schema.name} records do not support ${operation}`,
      { record: record.schema.name }
    );
  }
  return record;
}

/**
 * Build a record from positional values and values keyed by field name.
 * Unlike `Type.from`, the names are not checked at compile time.
 */
export function construct<Instance>(
  type: new (...values: unknown[]) => Instance,
  positional: readonly unknown[] = [],
  namedValues: Readonly<Record<string, unknown>> = {}
): Instance {
  return new type(...positional, new NamedValues(namedValues));
}

export function get(record: AnyRecord, field: string): unknown {
  return record.get(field);
}

export function set(record: AnyRecord, field: string, value: unknown): void {
  record.set(field, value);
}

export function deleteField(record: AnyRecord, field: string): never {
  return record.delete(field);
}

export function index(record: AnyRecord, position: number): unknown {
  return requireIndexable(record, 'positional access').at(position);
}

export function indexSet(record: AnyRecord, position: number, value: unknown): void {
  requireIndexable(record, 'positional access').setAt(position, value);
}

export function slice(
  record: AnyRecord,
  start?: SliceBound,
  stop?: SliceBound,
  step?: SliceBound
): unknown[] {
  return requireIndexable(record, 'slicing').slice(start, stop, step);
}

export function sliceSet(
  record: AnyRecord,
  values: Iterable<unknown>,
  start?: SliceBound,
  stop?: SliceBound,
  step?: SliceBound
): void {
  requireIndexable(record, 'slicing').setSlice(values, start, stop, step);
}

export function length(record: AnyRecord): number {
  return requireIndexable(record, 'length').length;
}

export function contains(record: AnyRecord, value: unknown): boolean {
  return requireIndexable(record, 'membership tests').includes(value);
}

export function iterate(record: AnyRecord): IterableIterator<unknown> {
  return requireIndexable(record, 'iteration')[Symbol.iterator]();
}

/**
 * Frozen values in declared order, for either flavor
 */
export function toTuple(record: AnyRecord): readonly unknown[] {
  if (isIndexable(record)) return Object.freeze(record.toArray());
  return Object.freeze(Object.values(record.toDict()));
}

export function toDict(record: AnyRecord): Record<string, unknown> {
  return record.toDict();
}

export function describe(record: AnyRecord): string {
  return record.describe();
}

export function equals(a: AnyRecord, b: AnyRecord): boolean {
  return a.equals(b);
}

export function lessThan(a: AnyRecord, b: AnyRecord): boolean {
  return a.lessThan(b);
}

export function greaterThan(a: AnyRecord, b: AnyRecord): boolean {
  return a.greaterThan(b);
}

export function lessOrEqual(a: AnyRecord, b: AnyRecord): boolean {
  return a.lessOrEqual(b);
}

export function greaterOrEqual(a: AnyRecord, b: AnyRecord): boolean {
  return a.greaterOrEqual(b);
}
