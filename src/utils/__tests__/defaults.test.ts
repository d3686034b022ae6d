/**
 * Unit tests for the well-known default values used by unwrapOrDefault.
 */

import type { ResultValue } from '../../types/result';
import type { AcceptsDefault } from '../defaults';
import { defaultFor, isDefaultable } from '../defaults';
import { failure, success } from '../result';
import { Duration } from '../../types/duration';
import { UnsupportedDefaultTypeError } from '../../errors';

/** true when the compiler lets token C default a T. */
type Accepted<C, T> = [AcceptsDefault<C, T>] extends [never] ? false : true;

class Point {
  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

describe('defaults', () => {
  describe('defaultFor', () => {
    it('should return zero for Number', () => {
      expect(defaultFor(Number)).toBe(0);
    });

    it('should return an empty string for String', () => {
      expect(defaultFor(String)).toBe('');
    });

    it('should return false for Boolean', () => {
      expect(defaultFor(Boolean)).toBe(false);
    });

    it('should return zero for BigInt', () => {
      expect(defaultFor(BigInt)).toBe(0n);
    });

    it('should return empty collections', () => {
      expect(defaultFor(Array)).toEqual([]);
      expect(defaultFor(Map).size).toBe(0);
      expect(defaultFor(Set).size).toBe(0);
    });

    it('should return fresh mutable defaults on every call', () => {
      expect(defaultFor(Array)).not.toBe(defaultFor(Array));
      expect(defaultFor(Map)).not.toBe(defaultFor(Map));
    });

    it('should return the zero duration', () => {
      expect(defaultFor(Duration)).toBe(Duration.ZERO);
      expect(defaultFor(Duration).milliseconds).toBe(0);
    });

    it('should return the epoch for Date', () => {
      expect(defaultFor(Date).getTime()).toBe(0);
    });

    it('should return an empty pattern for RegExp', () => {
      const pattern = defaultFor(RegExp);

      expect(pattern.source).toBe('(?:)');
      expect(pattern.flags).toBe('');
    });

    it('should return about:blank for URL', () => {
      expect(defaultFor(URL).href).toBe('about:blank');
    });

    it('should reject types outside the whitelist', () => {
      expect(() => defaultFor(Point)).toThrow(UnsupportedDefaultTypeError);
      expect(() => defaultFor(Point)).toThrow(
        'Type Point is not supported, please use unwrapOr or unwrapOrElse',
      );
    });

    it('should not treat Object as a catch-all default', () => {
      expect(() => defaultFor(Object)).toThrow(UnsupportedDefaultTypeError);
      expect(() => defaultFor(Object)).toThrow('Type Object is not supported');
    });

    it('should name anonymous types', () => {
      const anonymous = (() => class {})();

      try {
        defaultFor(anonymous);
        throw new Error('expected defaultFor to throw');
      } catch (e) {
        expect(e).toBeInstanceOf(UnsupportedDefaultTypeError);
        if (e instanceof UnsupportedDefaultTypeError) {
          expect(e.typeName).toBe('<anonymous>');
        }
      }
    });
  });

  describe('isDefaultable', () => {
    it('should report whitelist membership', () => {
      expect(isDefaultable(Number)).toBe(true);
      expect(isDefaultable(URL)).toBe(true);
      expect(isDefaultable(Point)).toBe(false);
      expect(isDefaultable(Object)).toBe(false);
    });
  });

  describe('unwrapOrDefault', () => {
    it('should default a failed string result', () => {
      const result: ResultValue<string, number> = failure(404);

      expect(result.unwrapOrDefault(String)).toBe('');
    });

    it('should default a failed map result', () => {
      const result: ResultValue<Map<string, number>, string> = failure('bad');
      const value = result.unwrapOrDefault(Map);

      expect(value).toBeInstanceOf(Map);
      expect(value.size).toBe(0);
    });

    it('should default a failed list result', () => {
      const result: ResultValue<number[], string> = failure('bad');

      expect(result.unwrapOrDefault(Array)).toEqual([]);
    });

    it('should throw UnsupportedDefaultTypeError for a failed user type', () => {
      const result: ResultValue<Point, string> = failure('bad');

      expect(() => result.unwrapOrDefault(Point)).toThrow(UnsupportedDefaultTypeError);
    });

    it('should throw instead of fabricating an object for a failed user type', () => {
      const result: ResultValue<Point, string> = failure('bad');

      expect(() => result.unwrapOrDefault(Object)).toThrow(UnsupportedDefaultTypeError);
    });

    it('should return a Success value even for unsupported types', () => {
      const point = new Point(1, 2);
      const result: ResultValue<Point, string> = success(point);

      expect(result.unwrapOrDefault(Point)).toBe(point);
    });
  });

  describe('AcceptsDefault', () => {
    it('should accept tokens whose default fits the result type', () => {
      const numberForNumber: Accepted<NumberConstructor, number> = true;
      const arrayForList: Accepted<ArrayConstructor, string[]> = true;
      const mapForMap: Accepted<MapConstructor, Map<string, number>> = true;
      const dateForDate: Accepted<DateConstructor, Date> = true;

      expect([numberForNumber, arrayForList, mapForMap, dateForDate]).toEqual([
        true,
        true,
        true,
        true,
      ]);
    });

    it('should reject whitelisted tokens whose default does not fit', () => {
      const dateForString: Accepted<DateConstructor, string> = false;
      const numberForString: Accepted<NumberConstructor, string> = false;
      const stringForPoint: Accepted<StringConstructor, Point> = false;
      const setForList: Accepted<SetConstructor, number[]> = false;

      expect([dateForString, numberForString, stringForPoint, setForList]).toEqual([
        false,
        false,
        false,
        false,
      ]);
    });

    it('should leave unknown tokens to the runtime check', () => {
      const objectForPoint: Accepted<ObjectConstructor, Point> = true;
      const pointForPoint: Accepted<typeof Point, Point> = true;

      expect([objectForPoint, pointForPoint]).toEqual([true, true]);
    });
  });
});
