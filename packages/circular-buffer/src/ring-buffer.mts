/**
 * Fixed-capacity ring buffer
 *
 * Unlike a sliding window, a full ring never overwrites: `append` and
 * `prepend` report `false` and leave the buffer untouched. Eviction is up to
 * the caller via `popFirst`/`popLast`.
 */

import { InvalidCapacityError, precondition } from '@coatcheck/errors';
import { debuglog } from 'util';

import { CircularStore } from './circular-store.mjs';

const debug = debuglog('coatcheck:circular-buffer');

const assertRingSize = (size: number, option: string): void => {
  precondition(
    Number.isInteger(size) && size > 2,
    () => new InvalidCapacityError(`The size of a RingBuffer must be an integer more than two, got ${size}`, option, size)
  );
};

export class RingBuffer<T> extends CircularStore<T> {
  /**
   * @param size - usable capacity, must be more than two. One extra slot is
   * allocated so that full and empty stay distinguishable.
   */
  constructor(size: number) {
    assertRingSize(size, 'size');
    super(size + 1);
  }

  /**
   * Maximum number of elements the buffer holds
   */
  get capacity(): number {
    return this.backingLength - 1;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  /**
   * Add an element after the last one
   * O(1) operation
   * @returns false, without modifying the buffer, when it is full
   */
  append(element: T): boolean {
    return this.tryAppend(element);
  }

  /**
   * Add an element before the first one
   * O(1) operation
   * @returns false, without modifying the buffer, when it is full
   */
  prepend(element: T): boolean {
    return this.tryPrepend(element);
  }

  /**
   * Append elements in order until the buffer is full
   * @returns the number of elements appended
   */
  appendAll(elements: Iterable<T>): number {
    let appended = 0;
    for (const element of elements) {
      if (!this.append(element)) break;
      appended++;
    }
    return appended;
  }

  /**
   * Prepend elements in order until the buffer is full. The last element
   * prepended ends up first.
   * @returns the number of elements prepended
   */
  prependAll(elements: Iterable<T>): number {
    let prepended = 0;
    for (const element of elements) {
      if (!this.prepend(element)) break;
      prepended++;
    }
    return prepended;
  }

  /**
   * Create a new ring of `newSize` holding a copy of this one's elements.
   *
   * When `newSize` is smaller than `count`, only the first `newSize` elements
   * are kept and the rest are dropped.
   */
  resized(newSize: number): RingBuffer<T> {
    const ring = new RingBuffer<T>(newSize);
    const kept = ring.appendAll(this);

    if (kept < this.count) {
      debug(`Resizing to ${newSize} dropped ${this.count - kept} element(s)`);
    }
    return ring;
  }

  /**
   * In-place version of {@link resized}
   */
  resize(newSize: number): void {
    this.copyFrom(this.resized(newSize));
  }

  /**
   * Grow the buffer so that it holds at least `minCapacity` elements.
   * Never shrinks.
   */
  reserveCapacity(minCapacity: number): void {
    if (this.capacity >= minCapacity) {
      return;
    }
    assertRingSize(minCapacity, 'minCapacity');
    this.reallocate(minCapacity + 1);
  }

  /**
   * Remove all elements, optionally resizing the now empty buffer
   */
  clear(resizeTo = 0): void {
    if (resizeTo > 0) {
      assertRingSize(resizeTo, 'resizeTo');
      this.reset(resizeTo + 1);
      return;
    }
    this.reset(this.backingLength);
  }

  /**
   * Independent copy; later changes to either buffer do not affect the other
   */
  clone(): RingBuffer<T> {
    const copy = new RingBuffer<T>(this.capacity);
    copy.copyFrom(this);
    return copy;
  }
}
