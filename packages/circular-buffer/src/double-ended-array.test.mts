import { describe, it, expect } from 'vitest';
import { EmptyCollectionError, IndexOutOfRangeError, InvalidCapacityError } from '@coatcheck/errors';
import { DoubleEndedArray, GROWTH_FACTOR } from './double-ended-array.mjs';

const range = (count: number): number[] => Array.from({ length: count }, (_, i) => i);

describe('DoubleEndedArray', () => {
  describe('initialization', () => {
    it('should start empty with a backing store of two slots', () => {
      const array = new DoubleEndedArray<number>();
      expect(array.capacity).toBe(2);
      expect(array.length).toBe(0);
      expect(array.isEmpty()).toBe(true);
    });

    it('should accept an initial capacity', () => {
      const array = new DoubleEndedArray<number>({ initialCapacity: 16 });
      expect(array.capacity).toBe(16);
    });

    it('should reject invalid options', () => {
      expect(() => new DoubleEndedArray<number>({ initialCapacity: 1 })).toThrow(InvalidCapacityError);
      expect(() => new DoubleEndedArray<number>({ growthFactor: 1 })).toThrow(
        'The growth factor must be more than one, got 1'
      );
    });

    it('should build from an iterable', () => {
      const array = DoubleEndedArray.from([0, 1, 2, 3, 4, 5]);
      expect(array.toArray()).toEqual([0, 1, 2, 3, 4, 5]);
    });
  });

  describe('append and prepend', () => {
    it('should keep appended elements in insertion order', () => {
      const array = new DoubleEndedArray<string>();
      array.append('a');
      array.append('b');

      expect(array.at(0)).toBe('a');
      expect(array.at(1)).toBe('b');
    });

    it('should keep prepended elements in reverse insertion order', () => {
      const array = new DoubleEndedArray<string>();
      array.prepend('a');
      array.prepend('b');

      expect(array.at(0)).toBe('b');
      expect(array.at(1)).toBe('a');
    });

    it('should grow by the golden ratio', () => {
      const array = new DoubleEndedArray<number>();
      expect(GROWTH_FACTOR).toBe(1.618);

      array.append(1);
      expect(array.capacity).toBe(2);

      array.append(2);
      expect(array.capacity).toBe(4);

      array.append(3);
      array.append(4);
      expect(array.capacity).toBe(7);
      expect(array.toArray()).toEqual([1, 2, 3, 4]);
    });

    it('should only ever increase capacity while growing', () => {
      const array = new DoubleEndedArray<number>();
      let capacity = array.capacity;
      let growths = 0;

      for (let i = 0; i < 5000; i++) {
        if (i % 3 === 0) {
          array.prepend(i);
        } else {
          array.append(i);
        }
        if (array.capacity !== capacity) {
          expect(array.capacity).toBeGreaterThan(capacity);
          capacity = array.capacity;
          growths++;
        }
      }

      expect(array.length).toBe(5000);
      expect(growths).toBeGreaterThan(0);
    });

    it('should fill from both ends and drain symmetrically', () => {
      const array = new DoubleEndedArray<number>();

      for (let i = 0; i < 1000; i++) {
        array.append(i);
        array.prepend(i);
      }
      for (let i = 999; i >= 0; i--) {
        expect(array.removeFirst()).toBe(i);
        expect(array.removeLast()).toBe(i);
      }
      expect(array.isEmpty()).toBe(true);

      for (let i = 0; i < 1000; i++) {
        array.append(i);
      }
      for (let i = 0; i < 1000; i++) {
        expect(array.at(i)).toBe(i);
      }
    });

    it('should report every element of a sequence as inserted', () => {
      const array = new DoubleEndedArray<number>();

      expect(array.appendAll(range(1000))).toBe(1000);
      expect(array.prependAll([-1, -2])).toBe(2);
      expect(array.length).toBe(1002);
      expect(array.at(0)).toBe(-2);
      expect(array.at(1)).toBe(-1);
      expect(array.at(1001)).toBe(999);
    });
  });

  describe('pop and remove', () => {
    it('should return undefined when popping an empty array', () => {
      const array = new DoubleEndedArray<number>();
      expect(array.popFirst()).toBeUndefined();
      expect(array.popLast()).toBeUndefined();
    });

    it('should throw when removing from an empty array', () => {
      const array = new DoubleEndedArray<number>();
      expect(() => array.removeFirst()).toThrow(EmptyCollectionError);
      expect(() => array.removeLast()).toThrow(EmptyCollectionError);
    });

    it('should work as a queue across wraparound', () => {
      const array = new DoubleEndedArray<number>({ initialCapacity: 4 });
      array.appendAll([1, 2, 3]);
      expect(array.popFirst()).toBe(1);
      expect(array.popFirst()).toBe(2);

      array.appendAll([4, 5]);
      expect(array.capacity).toBe(4);
      expect(array.toArray()).toEqual([3, 4, 5]);
    });
  });

  describe('random access', () => {
    it('should throw for indexes outside the live range', () => {
      const array = DoubleEndedArray.from([1, 2, 3]);
      expect(() => array.at(3)).toThrow(IndexOutOfRangeError);
      expect(() => array.at(-1)).toThrow(IndexOutOfRangeError);
    });

    it('should overwrite in place', () => {
      const array = DoubleEndedArray.from([1, 2, 3]);
      array.set(1, 20);
      expect(array.toArray()).toEqual([1, 20, 3]);
    });
  });

  describe('iteration', () => {
    it('should iterate in logical order', () => {
      const array = DoubleEndedArray.from(range(1000));

      let expected = 0;
      for (const element of array) {
        expect(element).toBe(expected);
        expected++;
      }
      expect(expected).toBe(1000);
    });
  });

  describe('capacity management', () => {
    it('should reserve capacity up front', () => {
      const array = DoubleEndedArray.from([1, 2]);

      array.reserveCapacity(100);
      expect(array.capacity).toBe(100);
      expect(array.toArray()).toEqual([1, 2]);

      array.reserveCapacity(10);
      expect(array.capacity).toBe(100);
    });

    it('should shrink back to the initial capacity on clear', () => {
      const array = DoubleEndedArray.from(range(50));

      array.clear();
      expect(array.isEmpty()).toBe(true);
      expect(array.capacity).toBe(2);
    });

    it('should keep the capacity on clear when asked to', () => {
      const array = DoubleEndedArray.from(range(50));
      const capacity = array.capacity;

      array.clear(true);
      expect(array.isEmpty()).toBe(true);
      expect(array.capacity).toBe(capacity);
    });
  });

  describe('clone', () => {
    it('should produce an independent copy', () => {
      const array = DoubleEndedArray.from([1, 2, 3]);
      const copy = array.clone();

      copy.prepend(0);
      array.popLast();

      expect(copy.toArray()).toEqual([0, 1, 2, 3]);
      expect(array.toArray()).toEqual([1, 2]);
    });
  });
});
