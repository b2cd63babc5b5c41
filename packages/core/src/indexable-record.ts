/**
 * Records that also behave like a fixed-length mutable sequence
 */

import { IndexError, normalizeIndex, resolveSlice, valuesEqual } from '@recordsmith/shared';
import type { SliceBound } from '@recordsmith/shared';
import { BaseRecord } from './base-record';

export abstract class IndexableRecord<Field extends string = string>
  extends BaseRecord<Field>
  implements Iterable<unknown>
{
  /**
   * Number of fields
   */
  get length(): number {
    return this.schema.fields.length;
  }

  /**
   * Read the field at `index`; negative indices count from the end
   */
  at(index: number): unknown {
    return this.valueAt(this.resolveIndex(index));
  }

  /**
   * Write the field at `index`, through the validator
   */
  setAt(index: number, value: unknown): void {
    this.writeAt(this.resolveIndex(index), value);
  }

  /**
   * Copy of the values selected by `[start:stop:step]`
   */
  slice(start?: SliceBound, stop?: SliceBound, step?: SliceBound): unknown[] {
    return resolveSlice(this.length, start, stop, step).map(index => this.valueAt(index));
  }

  /**
   * Assign `values` to the fields selected by `[start:stop:step]`, pairing them
   * in order. Whichever side runs out first ends the assignment.
   */
  setSlice(values: Iterable<unknown>, start?: SliceBound, stop?: SliceBound, step?: SliceBound): void {
    const indices = resolveSlice(this.length, start, stop, step);
    let position = 0;
    for (const value of values) {
      if (position >= indices.length) break;
      this.writeAt(indices[position], value);
      position++;
    }
  }

  includes(value: unknown): boolean {
    return this.snapshot().some(current => valuesEqual(current, value));
  }

  toArray(): unknown[] {
    return this.snapshot();
  }

  *[Symbol.iterator](): IterableIterator<unknown> {
    for (let index = 0; index < this.length; index++) {
      yield this.valueAt(index);
    }
  }

  private resolveIndex(index: number): number {
    const resolved = normalizeIndex(index, this.length);
    if (resolved === undefined) {
      throw new IndexError(
        `${this.schema.name} index ${index} out of range for ${this.length} fields`,
        { record: this.schema.name, index, length: this.length }
      );
    }
    return resolved;
  }
}
