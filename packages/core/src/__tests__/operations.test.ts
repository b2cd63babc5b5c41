/**
 * Unit tests for the free-function record operations
 */

import { describe, it, expect } from 'vitest';
import * as records from '../operations';
import { defineRecord, defineObject } from '../define';
import { ArityError, OperationNotSupportedError, UnknownFieldError } from '@recordsmith/shared';

const Point = defineRecord('Point', ['x', 'y']);
const Rgba = defineObject('Rgba', 'red green blue alpha', { defaults: [0, 0, 0, 1] });

describe('record operations', () => {
  describe('construct', () => {
    it('should combine positional and named values', () => {
      const point = records.construct(Point, [1], { y: 2 });

      expect(point.toDict()).toEqual({ x: 1, y: 2 });
    });

    it('should check names and arity at runtime', () => {
      expect(() => records.construct(Point, [], { z: 1 })).toThrow(UnknownFieldError);
      expect(() => records.construct(Point, [], { z: 1 })).toThrow('Point does not have a z field');
      expect(() => records.construct(Point, [1, 2], { x: 3 })).toThrow(ArityError);
    });
  });

  describe('named access', () => {
    it('should read and write either flavor', () => {
      const point = new Point(1, 2);
      const color = new Rgba(10);

      records.set(point, 'y', 5);
      records.set(color, 'green', 20);

      expect(records.get(point, 'y')).toBe(5);
      expect(records.get(color, 'green')).toBe(20);
    });

    it('should reject deletion', () => {
      expect(() => records.deleteField(new Point(1, 2), 'x')).toThrow(OperationNotSupportedError);
    });
  });

  describe('positional access', () => {
    it('should work on indexable records', () => {
      const point = new Point(1, 2);

      records.indexSet(point, -1, 7);
      records.sliceSet(point, [4], 0, 1);

      expect(records.index(point, 1)).toBe(7);
      expect(records.slice(point)).toEqual([4, 7]);
      expect(records.length(point)).toBe(2);
      expect(records.contains(point, 4)).toBe(true);
      expect([...records.iterate(point)]).toEqual([4, 7]);
    });

    it('should reject object records', () => {
      const color = new Rgba();

      expect(() => records.index(color, 0)).toThrow('Rgba records do not support positional access');
      expect(() => records.indexSet(color, 0, 1)).toThrow(OperationNotSupportedError);
      expect(() => records.slice(color, 0, 2)).toThrow('Rgba records do not support slicing');
      expect(() => records.sliceSet(color, [1], 0, 1)).toThrow('Rgba records do not support slicing');
      expect(() => records.length(color)).toThrow('Rgba records do not support length');
      expect(() => records.contains(color, 0)).toThrow('Rgba records do not support membership tests');
      expect(() => records.iterate(color)).toThrow('Rgba records do not support iteration');
    });

    it('should tell the flavors apart', () => {
      expect(records.isIndexable(new Point(1, 2))).toBe(true);
      expect(records.isIndexable(new Rgba())).toBe(false);
    });
  });

  describe('projections', () => {
    it('should produce frozen tuples for both flavors', () => {
      const pointTuple = records.toTuple(new Point(1, 2));
      const colorTuple = records.toTuple(new Rgba(1, 2, 3));

      expect(pointTuple).toEqual([1, 2]);
      expect(colorTuple).toEqual([1, 2, 3, 1]);
      expect(Object.isFrozen(pointTuple)).toBe(true);
      expect(Object.isFrozen(colorTuple)).toBe(true);
    });

    it('should produce dicts and descriptions', () => {
      expect(records.toDict(new Rgba(1))).toEqual({ red: 1, green: 0, blue: 0, alpha: 1 });
      expect(records.describe(new Point(1, 'a'))).toBe("Point(x=1, y='a')");
    });
  });

  describe('round trips', () => {
    function clamp(_field: string, value: unknown): unknown {
      return typeof value === 'number' ? Math.min(Math.max(value, 0), 10) : value;
    }

    it('should rebuild an equal record from its tuple', () => {
      const Quad = defineRecord('Quad', 'a b c d');
      const quad = new Quad(1, 'x', [2], null);
      const color = new Rgba(1, 2, 3);

      expect(records.construct(Quad, records.toTuple(quad)).equals(quad)).toBe(true);
      expect(records.construct(Rgba, records.toTuple(color)).equals(color)).toBe(true);
    });

    it('should leave a record unchanged when writing back what it holds', () => {
      const Range = defineRecord('Range', ['low', 'high'], { validator: clamp });
      const Bounds = defineObject('Bounds', ['low', 'high'], { validator: clamp });

      for (const record of [new Range(-5, 50), new Bounds(-5, 50)]) {
        const before = records.toTuple(record);

        for (const field of record.schema.fields) {
          records.set(record, field, records.get(record, field));
        }

        expect(before).toEqual([0, 10]);
        expect(records.toTuple(record)).toEqual(before);
      }
    });
  });

  describe('comparisons', () => {
    it('should delegate to the records', () => {
      const low = new Point(1, 2);
      const high = new Point(2, 0);

      expect(records.equals(low, new Point(1, 2))).toBe(true);
      expect(records.lessThan(low, high)).toBe(true);
      expect(records.greaterThan(high, low)).toBe(true);
      expect(records.lessOrEqual(low, low)).toBe(true);
      expect(records.greaterOrEqual(low, high)).toBe(false);
    });
  });
});
