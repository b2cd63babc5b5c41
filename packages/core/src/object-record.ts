/**
 * Records with field-name access only
 */

import { BaseRecord } from './base-record';

export abstract class ObjectRecord<Field extends string = string> extends BaseRecord<Field> {
  /**
   * Frozen snapshot of the values in declared order
   */
  toTuple(): readonly unknown[] {
    return Object.freeze(this.snapshot());
  }
}
