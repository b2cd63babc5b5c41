/**
 * Shared types used by the record helpers and the core package
 */

/**
 * Brand carried by every record instance, so the value helpers can recognise
 * nested records without importing the record classes.
 */
export const RECORD_BRAND: unique symbol = Symbol.for('recordsmith.record');

/**
 * The part of a record the value helpers rely on
 */
export interface RecordLike {
  readonly [RECORD_BRAND]: true;
  describe(): string;
  equals(other: unknown): boolean;
  /**
   * -1, 0 or 1; undefined when the two records come from different schemas
   */
  compare(other: unknown): -1 | 0 | 1 | undefined;
}

export function isRecordLike(value: unknown): value is RecordLike {
  return (
    typeof value === 'object' &&
    value !== null &&
    RECORD_BRAND in value &&
    value[RECORD_BRAND] === true
  );
}

/**
 * Called on every field write with the field name and the candidate value.
 * Returns the value to store, or throws to reject the write.
 */
export type FieldValidator<Field extends string = string> = (
  field: Field,
  value: unknown
) => unknown;

/**
 * Open slice bound, as in `values[start:stop:step]`
 */
export type SliceBound = number | null | undefined;
