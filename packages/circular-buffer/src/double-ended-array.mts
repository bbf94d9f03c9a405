import { InvalidCapacityError, precondition } from '@coatcheck/errors';
import { debuglog } from 'util';

import { CircularStore } from './circular-store.mjs';

const debug = debuglog('coatcheck:circular-buffer');

/** Backing store growth factor, roughly the golden ratio */
export const GROWTH_FACTOR = 1.618;

export const DEFAULT_INITIAL_CAPACITY = 2;

export interface DoubleEndedArrayOptions {
  /** Initial backing store length, at least 2 (default: 2) */
  initialCapacity?: number;
  /** Multiplier applied to the backing length on growth, more than 1 (default: 1.618) */
  growthFactor?: number;
}

/**
 * Growable double-ended array.
 *
 * Appending and prepending are amortized O(1) and never fail; random access
 * is O(1). When no slot is free the backing store grows by
 * {@link GROWTH_FACTOR} and the insertion is retried.
 *
 * @example
 * ```typescript
 * const queue = DoubleEndedArray.from([2, 3]);
 * queue.prepend(1);
 * queue.append(4);
 * queue.toArray(); // => [1, 2, 3, 4]
 * ```
 */
export class DoubleEndedArray<T> extends CircularStore<T> {
  private readonly initialCapacity: number;
  private readonly growthFactor: number;

  constructor(options?: DoubleEndedArrayOptions) {
    const initialCapacity = options?.initialCapacity ?? DEFAULT_INITIAL_CAPACITY;
    const growthFactor = options?.growthFactor ?? GROWTH_FACTOR;

    precondition(
      Number.isInteger(initialCapacity) && initialCapacity >= 2,
      () =>
        new InvalidCapacityError(
          `The capacity of a DoubleEndedArray must be at least two, got ${initialCapacity}`,
          'initialCapacity',
          initialCapacity
        )
    );
    precondition(
      Number.isFinite(growthFactor) && growthFactor > 1,
      () =>
        new InvalidCapacityError(
          `The growth factor must be more than one, got ${growthFactor}`,
          'growthFactor',
          growthFactor
        )
    );

    super(initialCapacity);
    this.initialCapacity = initialCapacity;
    this.growthFactor = growthFactor;
  }

  static from<T>(elements: Iterable<T>, options?: DoubleEndedArrayOptions): DoubleEndedArray<T> {
    const array = new DoubleEndedArray<T>(options);
    array.appendAll(elements);
    return array;
  }

  /**
   * Length of the backing store
   */
  get capacity(): number {
    return this.backingLength;
  }

  /**
   * Add an element after the last one
   * Amortized O(1) operation
   */
  append(element: T): void {
    while (!this.tryAppend(element)) {
      this.grow();
    }
  }

  /**
   * Add an element before the first one
   * Amortized O(1) operation
   */
  prepend(element: T): void {
    while (!this.tryPrepend(element)) {
      this.grow();
    }
  }

  /**
   * @returns the number of elements appended, always all of them
   */
  appendAll(elements: Iterable<T>): number {
    let appended = 0;
    for (const element of elements) {
      this.append(element);
      appended++;
    }
    return appended;
  }

  /**
   * Prepend elements in order. The last element prepended ends up first.
   * @returns the number of elements prepended, always all of them
   */
  prependAll(elements: Iterable<T>): number {
    let prepended = 0;
    for (const element of elements) {
      this.prepend(element);
      prepended++;
    }
    return prepended;
  }

  /**
   * Grow the backing store to `minCapacity` slots if it is smaller
   */
  reserveCapacity(minCapacity: number): void {
    if (this.backingLength >= minCapacity) {
      return;
    }
    this.grow(Math.ceil(minCapacity));
  }

  /**
   * Remove all elements. Unless `keepCapacity` is set the backing store
   * shrinks back to its initial length.
   */
  clear(keepCapacity = false): void {
    this.reset(keepCapacity ? this.backingLength : this.initialCapacity);
  }

  /**
   * Independent copy; later changes to either array do not affect the other
   */
  clone(): DoubleEndedArray<T> {
    const copy = new DoubleEndedArray<T>({
      initialCapacity: this.initialCapacity,
      growthFactor: this.growthFactor,
    });
    copy.copyFrom(this);
    return copy;
  }

  private grow(newCapacity?: number): void {
    const capacity = newCapacity ?? Math.ceil(this.growthFactor * this.backingLength);
    debug(`Growing DoubleEndedArray holding ${this.count} element(s)`);
    this.reallocate(capacity);
  }
}
