/**
 * Behavior shared by indexable and object records
 */

import { inspect } from 'util';
import {
  OperationNotSupportedError,
  RECORD_BRAND,
  UnknownFieldError,
  compareSequences,
  formatValue,
  valuesEqual
} from '@recordsmith/shared';
import type { RecordLike } from '@recordsmith/shared';
import { resolveValues, validateField } from './schema';
import type { RecordSchema } from './types';

export abstract class BaseRecord<Field extends string = string> implements RecordLike {
  readonly #schema: RecordSchema<Field>;
  readonly #values: unknown[];

  /**
   * Resolves every value before the record exists, so a failed construction
   * leaves nothing behind. Each field then gets a non-configurable accessor.
   */
  protected constructor(schema: RecordSchema<Field>, args: readonly unknown[]) {
    this.#values = resolveValues(schema, args);
    this.#schema = schema;

    schema.fields.forEach((field, index) => {
      Object.defineProperty(this, field, {
        get: () => this.#values[index],
        set: (value: unknown) => this.writeAt(index, value),
        enumerable: true,
        configurable: false
      });
    });
  }

  get [RECORD_BRAND](): true {
    return true;
  }

  /**
   * The schema this record was built from
   */
  get schema(): RecordSchema<Field> {
    return this.#schema;
  }

  /**
   * Read a field by name
   */
  get(field: string): unknown {
    return this.#values[this.positionOf(field)];
  }

  /**
   * Write a field by name, through the validator.
   * Assigning a property that is not a field fails with the runtime's
   * TypeError; `set` reports it as UnknownFieldError.
   */
  set(field: string, value: unknown): void {
    this.writeAt(this.positionOf(field), value);
  }

  /**
   * Fields are fixed by the schema and can never be removed
   */
  delete(field: string): never {
    throw new OperationNotSupportedError(`${this.#schema.name} fields cannot be deleted`, {
      record: this.#schema.name,
      field
    });
  }

  /**
   * Snapshot of the values keyed by field name, in declared order
   */
  toDict(): Record<Field, unknown> {
    const dict: Partial<Record<Field, unknown>> = {};
    this.#schema.fields.forEach((field, index) => {
      dict[field] = this.#values[index];
    });
    return dict as Record<Field, unknown>;
  }

  toJSON(): Record<Field, unknown> {
    return this.toDict();
  }

  /**
   * `Name(field1=value1, field2=value2)`
   */
  describe(): string {
    const pairs = this.#schema.fields.map(
      (field, index) => `${field}=${formatValue(this.#values[index])}`
    );
    return `${this.#schema.name}(${pairs.join(', ')})`;
  }

  toString(): string {
    return this.describe();
  }

  [inspect.custom](): string {
    return this.describe();
  }

  /**
   * True for a record of the same schema whose values are pairwise equal
   */
  equals(other: unknown): boolean {
    if (!this.sameSchema(other)) return false;
    return this.#values.every((value, index) => valuesEqual(value, other.#values[index]));
  }

  /**
   * Lexicographic comparison of the values.
   * Undefined when `other` is not a record of the same schema.
   */
  compare(other: unknown): -1 | 0 | 1 | undefined {
    if (!this.sameSchema(other)) return undefined;
    return compareSequences(this.#values, other.#values);
  }

  lessThan(other: unknown): boolean {
    return this.compare(other) === -1;
  }

  // The remaining predicates derive from equals() and lessThan(); across
  // schemas every one of them is false.

  greaterThan(other: unknown): boolean {
    return this.sameSchema(other) && !this.lessThan(other) && !this.equals(other);
  }

  lessOrEqual(other: unknown): boolean {
    return this.lessThan(other) || this.equals(other);
  }

  greaterOrEqual(other: unknown): boolean {
    return this.sameSchema(other) && !this.lessThan(other);
  }

  protected valueAt(index: number): unknown {
    return this.#values[index];
  }

  /**
   * Store the validator's result; a rejected value leaves the field untouched
   */
  protected writeAt(index: number, value: unknown): void {
    const field = this.#schema.fields[index];
    this.#values[index] = validateField(this.#schema, field, value);
  }

  protected snapshot(): unknown[] {
    return [...this.#values];
  }

  private positionOf(field: string): number {
    const index = this.#schema.positions.get(field);
    if (index === undefined) {
      throw new UnknownFieldError(this.#schema.name, field);
    }
    return index;
  }

  private sameSchema(other: unknown): other is BaseRecord<Field> {
    return other instanceof BaseRecord && other.#schema.fingerprint === this.#schema.fingerprint;
  }
}
