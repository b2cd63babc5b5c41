/**
 * Unit tests for indexable records
 */

import { describe, it, expect } from 'vitest';
import { inspect } from 'util';
import { defineRecord } from '../define';
import {
  IndexError,
  OperationNotSupportedError,
  UnknownFieldError,
  ValidationError
} from '@recordsmith/shared';

const Options = defineRecord('Options', 'maxcolors shape zoom restore');
const Point = defineRecord('Point', ['x', 'y']);
const Vector = defineRecord('Vector', ['x', 'y']);

describe('IndexableRecord', () => {
  describe('field access', () => {
    it('should read and write fields by name', () => {
      const options = new Options(5, 'square', 0.9, true);

      expect(options.describe()).toBe("Options(maxcolors=5, shape='square', zoom=0.9, restore=true)");

      options.maxcolors = 7;
      options.set('zoom', 0.8);

      expect(options.get('maxcolors')).toBe(7);
      expect(options.zoom).toBe(0.8);
    });

    it('should reject unknown field names', () => {
      const point = new Point(1, 2);

      expect(() => point.get('z')).toThrow(UnknownFieldError);
      expect(() => point.set('z', 1)).toThrow('Point does not have a z field');
      expect(() => Object.assign(point, { z: 1 })).toThrow(TypeError);
    });

    it('should never delete fields', () => {
      const point = new Point(1, 2);

      expect(() => point.delete('x')).toThrow(OperationNotSupportedError);
      expect(() => point.delete('x')).toThrow('Point fields cannot be deleted');
      expect(Reflect.deleteProperty(point, 'x')).toBe(false);
      expect(point.x).toBe(1);
    });
  });

  describe('positional access', () => {
    it('should agree with named access', () => {
      const options = new Options(5, 'square', 0.9, true);

      options.setAt(-1, false);
      options.setAt(2, 0.8);

      expect(options.length).toBe(4);
      expect(options.at(0)).toBe(5);
      expect(options.at(-1)).toBe(false);
      expect(options.restore).toBe(false);
      expect(options.zoom).toBe(0.8);
      expect(options.describe()).toBe(
        "Options(maxcolors=5, shape='square', zoom=0.8, restore=false)"
      );
    });

    it('should reject indices out of range', () => {
      const options = new Options(5, 'square', 0.9, true);

      expect(() => options.at(4)).toThrow(IndexError);
      expect(() => options.at(4)).toThrow('Options index 4 out of range for 4 fields');
      expect(() => options.at(-5)).toThrow('Options index -5 out of range for 4 fields');
      expect(() => options.setAt(4, 1)).toThrow(IndexError);
    });

    it('should reject non-integer indices', () => {
      const point = new Point(1, 2);

      expect(() => point.at(1.5)).toThrow('Record indices must be integers, got 1.5');
    });
  });

  describe('slices', () => {
    const options = new Options(7, 'square', 0.8, false);

    it('should select with open, negative and stepped bounds', () => {
      expect(options.slice(1, 3)).toEqual(['square', 0.8]);
      expect(options.slice(-2)).toEqual([0.8, false]);
      expect(options.slice(null, null, -1)).toEqual([false, 0.8, 'square', 7]);
      expect(options.slice(0, 4, 2)).toEqual([7, 0.8]);
      expect(options.slice(10)).toEqual([]);
    });

    it('should return a copy', () => {
      const values = options.slice();
      values[0] = 99;

      expect(options.maxcolors).toBe(7);
    });

    it('should reject a zero step', () => {
      expect(() => options.slice(0, 4, 0)).toThrow('Slice step cannot be zero');
    });

    it('should assign until either side runs out', () => {
      const point = new Point(1, 2);

      point.setSlice([10, 20, 30]);
      expect(point.toArray()).toEqual([10, 20]);

      point.setSlice([5], 0, 2);
      expect(point.toArray()).toEqual([5, 20]);

      point.setSlice([7, 8], null, null, -1);
      expect(point.toArray()).toEqual([8, 7]);
    });
  });

  describe('sequence behavior', () => {
    it('should iterate values in declared order', () => {
      const point = new Point(3, 4);

      expect([...point]).toEqual([3, 4]);
      expect(Array.from(point)).toEqual([3, 4]);
    });

    it('should test membership by value', () => {
      const options = new Options(5, 'square', 0.9, true);

      expect(options.includes('square')).toBe(true);
      expect(options.includes(0.9)).toBe(true);
      expect(options.includes('circle')).toBe(false);
      expect(new Point(1, 2).includes(true)).toBe(true);
    });
  });

  describe('validated writes', () => {
    function validateRgba(name: string, value: unknown): unknown {
      if (typeof value !== 'number') {
        throw new ValidationError(`color value must be a number, got ${String(value)}`);
      }
      if (name === 'alpha') {
        if (!(value >= 0 && value <= 1)) return 1.0;
      } else if (!(value >= 0 && value <= 255)) {
        throw new ValidationError(`color value must be 0-255, got ${value}`);
      }
      return value;
    }

    const Rgba = defineRecord('Rgba', 'red green blue alpha', {
      defaults: [0, 0, 0, 1.0],
      validator: validateRgba
    });

    it('should keep the previous value when a write is rejected', () => {
      const color = new Rgba(100, 200, 250);

      expect(() => color.setAt(1, 299)).toThrow('color value must be 0-255, got 299');
      expect(() => {
        color.blue = 'navy';
      }).toThrow(ValidationError);
      expect(color.slice(null, 3)).toEqual([100, 200, 250]);
    });

    it('should store the substituted value', () => {
      const color = new Rgba(100, 200, 250);

      color.alpha = 7;

      expect(color.at(-1)).toBe(1.0);
    });

    it('should validate every slice assignment', () => {
      const color = new Rgba(100, 200, 250);

      color.setSlice([20, 25], 1, 3);

      expect(color.toDict()).toEqual({ red: 100, green: 20, blue: 25, alpha: 1 });
      expect(() => color.setSlice([1, 300], 0, 2)).toThrow('color value must be 0-255, got 300');
      expect(color.toArray()).toEqual([1, 20, 25, 1]);
    });
  });

  describe('projections and display', () => {
    it('should project to a dict and JSON', () => {
      const point = new Point(1, 2);

      expect(point.toDict()).toEqual({ x: 1, y: 2 });
      expect(JSON.stringify(point)).toBe('{"x":1,"y":2}');
    });

    it('should describe values the way a REPL echoes them', () => {
      const Label = defineRecord('Label', ['text', 'tags']);

      expect(new Label("it's", ['a', 'b']).describe()).toBe(`Label(text="it's", tags=['a', 'b'])`);
      expect(String(new Point(1, 2))).toBe('Point(x=1, y=2)');
      expect(inspect(new Point(1, 2))).toBe('Point(x=1, y=2)');
    });

    it('should describe nested records', () => {
      const Line = defineRecord('Line', ['start', 'end']);
      const line = new Line(new Point(0, 0), new Point(1, 1));

      expect(line.describe()).toBe('Line(start=Point(x=0, y=0), end=Point(x=1, y=1))');
    });
  });

  describe('equality and ordering', () => {
    it('should compare values lexicographically', () => {
      const a = new Point(3, 4);
      const b = new Point(3, 5);

      expect(a.equals(new Point(3, 4))).toBe(true);
      expect(a.equals(b)).toBe(false);
      expect(a.compare(b)).toBe(-1);
      expect(a.lessThan(b)).toBe(true);
      expect(a.lessOrEqual(b)).toBe(true);
      expect(a.greaterThan(b)).toBe(false);
      expect(b.greaterThan(a)).toBe(true);
      expect(b.greaterOrEqual(a)).toBe(true);
      expect(a.greaterOrEqual(new Point(3, 4))).toBe(true);
      expect(a.lessOrEqual(new Point(3, 4))).toBe(true);
    });

    it('should compare numbers and booleans by value', () => {
      expect(new Point(1, true).equals(new Point(1, 1))).toBe(true);
    });

    it('should never relate records of different schemas', () => {
      const point = new Point(3, 4);
      const vector = new Vector(3, 4);

      expect(point.equals(vector)).toBe(false);
      expect(point.compare(vector)).toBeUndefined();
      expect(point.lessThan(vector)).toBe(false);
      expect(point.greaterThan(vector)).toBe(false);
      expect(point.lessOrEqual(vector)).toBe(false);
      expect(point.greaterOrEqual(vector)).toBe(false);
    });

    it('should compare object-valued fields by contents', () => {
      const Box = defineRecord('Box', ['content']);
      const box = new Box({ k: 1 });

      expect(box.equals(new Box({ k: 1 }))).toBe(true);
      expect(box.equals(new Box({ k: 2 }))).toBe(false);
      expect(box.includes({ k: 1 })).toBe(true);
      expect(box.compare(new Box({ k: 1 }))).toBe(0);
      expect(new Box(new Set([1, 2])).equals(new Box(new Set([2, 1])))).toBe(true);
    });

    it('should not equal plain values', () => {
      expect(new Point(3, 4).equals([3, 4])).toBe(false);
      expect(new Point(3, 4).equals({ x: 3, y: 4 })).toBe(false);
    });

    it('should order nested records', () => {
      const Line = defineRecord('Line', ['start', 'end']);
      const short = new Line(new Point(0, 0), new Point(1, 1));
      const long = new Line(new Point(0, 0), new Point(1, 2));

      expect(short.lessThan(long)).toBe(true);
      expect(short.equals(new Line(new Point(0, 0), new Point(1, 1)))).toBe(true);
    });

    it('should reject ordering values that have no order', () => {
      const unset = new Point(null, 1);

      expect(() => unset.lessThan(new Point(2, 1))).toThrow(OperationNotSupportedError);
      expect(() => unset.lessThan(new Point(2, 1))).toThrow(
        'Ordering is not supported between null and number'
      );
      expect(unset.equals(new Point(null, 1))).toBe(true);
    });
  });
});
