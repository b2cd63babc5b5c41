/**
 * Value helpers shared by both record flavors
 */

import { inspect } from 'util';
import { OperationNotSupportedError, IndexError } from './errors';
import { isRecordLike, type SliceBound } from './types';

/**
 * Split a field list given as one whitespace-separated string ("x y z")
 */
export function splitFieldNames(fields: string | readonly string[]): string[] {
  if (typeof fields === 'string') {
    return fields.split(/\s+/).filter(name => name.length > 0);
  }
  return [...fields];
}

/**
 * Quote a string the way a REPL echoes it: single quotes unless the text
 * contains a single quote and no double quote.
 */
export function quoteString(text: string): string {
  const quote = text.includes("'") && !text.includes('"') ? '"' : "'";
  let escaped = '';
  for (const char of text) {
    switch (char) {
      case '\\':
        escaped += '\\\\';
        break;
      case '\n':
        escaped += '\\n';
        break;
      case '\r':
        escaped += '\\r';
        break;
      case '\t':
        escaped += '\\t';
        break;
      case quote:
        escaped += `\\${quote}`;
        break;
      default:
        escaped += char;
    }
  }
  return `${quote}${escaped}${quote}`;
}

/**
 * Format a field value for a record's string form
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return quoteString(value);
  if (isRecordLike(value)) return value.describe();
  if (Array.isArray(value)) {
    return `[${value.map(item => formatValue(item)).join(', ')}]`;
  }
  return inspect(value, { breakLength: Infinity, depth: 2 });
}

type Numeric = number | bigint | boolean;

function isNumeric(value: unknown): value is Numeric {
  return typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean';
}

function toNumeric(value: Numeric): number | bigint {
  return typeof value === 'boolean' ? Number(value) : value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function setsEqual(a: ReadonlySet<unknown>, b: ReadonlySet<unknown>): boolean {
  if (a.size !== b.size) return false;
  const candidates = [...b];
  for (const item of a) {
    if (b.has(item)) continue;
    if (!candidates.some(other => valuesEqual(item, other))) return false;
  }
  return true;
}

function mapsEqual(a: ReadonlyMap<unknown, unknown>, b: ReadonlyMap<unknown, unknown>): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    if (!b.has(key) || !valuesEqual(value, b.get(key))) return false;
  }
  return true;
}

function objectsEqual(a: Record<string, unknown>, b: Record<string, unknown>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every(key => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]));
}

/**
 * Value equality used for record equality and `includes`.
 * Numbers, bigints and booleans compare by numeric value; arrays and records
 * compare element by element; Dates compare by time; plain objects, Maps and
 * Sets compare by contents.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b || Object.is(a, b)) return true;

  if (isNumeric(a) && isNumeric(b)) {
    const left = toNumeric(a);
    const right = toNumeric(b);
    return !(left < right) && !(left > right) && !Number.isNaN(left) && !Number.isNaN(right);
  }

  if (isRecordLike(a) && isRecordLike(b)) return a.equals(b);

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();

  if (a instanceof Set && b instanceof Set) return setsEqual(a, b);

  if (a instanceof Map && b instanceof Map) return mapsEqual(a, b);

  if (isPlainObject(a) && isPlainObject(b)) return objectsEqual(a, b);

  return false;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  if (isRecordLike(value)) return 'record';
  return typeof value;
}

function sign(left: number | bigint | string, right: number | bigint | string): -1 | 0 | 1 {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Order two field values. Throws OperationNotSupportedError for pairs that
 * have no natural order (null, mixed types, records of different schemas).
 */
export function compareValues(a: unknown, b: unknown): -1 | 0 | 1 {
  if (isNumeric(a) && isNumeric(b)) return sign(toNumeric(a), toNumeric(b));

  if (typeof a === 'string' && typeof b === 'string') return sign(a, b);

  if (a instanceof Date && b instanceof Date) return sign(a.getTime(), b.getTime());

  if (Array.isArray(a) && Array.isArray(b)) return compareSequences(a, b);

  if (isRecordLike(a) && isRecordLike(b)) {
    const result = a.compare(b);
    if (result !== undefined) return result;
  }

  throw new OperationNotSupportedError(
    `Ordering is not supported between ${describeType(a)} and ${describeType(b)}`,
    { value: [a, b] }
  );
}

/**
 * Lexicographic order: the first pair of unequal values decides, otherwise the
 * shorter sequence sorts first.
 */
export function compareSequences(a: readonly unknown[], b: readonly unknown[]): -1 | 0 | 1 {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    if (!valuesEqual(a[i], b[i])) return compareValues(a[i], b[i]);
  }
  return sign(a.length, b.length);
}

/**
 * Resolve a possibly negative index against a sequence length.
 * Returns undefined when the index falls outside the sequence.
 */
export function normalizeIndex(index: number, length: number): number | undefined {
  if (!Number.isInteger(index)) {
    throw new IndexError(`Record indices must be integers, got ${String(index)}`, {
      index,
      length
    });
  }
  const resolved = index < 0 ? index + length : index;
  return resolved >= 0 && resolved < length ? resolved : undefined;
}

function clampBound(bound: number, length: number, lower: number, upper: number): number {
  if (!Number.isInteger(bound)) {
    throw new IndexError(`Slice indices must be integers, got ${String(bound)}`, { length });
  }
  const shifted = bound < 0 ? bound + length : bound;
  if (shifted < lower) return lower;
  if (shifted > upper) return upper;
  return shifted;
}

/**
 * The indices selected by `[start:stop:step]` on a sequence of `length` items,
 * in the order the slice visits them.
 */
export function resolveSlice(
  length: number,
  start?: SliceBound,
  stop?: SliceBound,
  step?: SliceBound
): number[] {
  const stride = step ?? 1;
  if (!Number.isInteger(stride)) {
    throw new IndexError(`Slice step must be an integer, got ${String(stride)}`, { length });
  }
  if (stride === 0) {
    throw new IndexError('Slice step cannot be zero', { length });
  }

  const lower = stride > 0 ? 0 : -1;
  const upper = stride > 0 ? length : length - 1;

  const first = start == null ? (stride > 0 ? lower : upper) : clampBound(start, length, lower, upper);
  const last = stop == null ? (stride > 0 ? upper : lower) : clampBound(stop, length, lower, upper);

  const indices: number[] = [];
  if (stride > 0) {
    for (let i = first; i < last; i += stride) indices.push(i);
  } else {
    for (let i = first; i > last; i += stride) indices.push(i);
  }
  return indices;
}
