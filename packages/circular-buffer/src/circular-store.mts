/**
 * Shared circular-buffer core
 *
 * A contiguous backing array addressed through a head and a tail index, both
 * taken modulo the backing length. `headIndex === tailIndex` means empty; one
 * slot is always left free so that a full store never looks empty.
 */

import { EmptyCollectionError, IndexOutOfRangeError, precondition } from '@coatcheck/errors';
import { debuglog } from 'util';

const debug = debuglog('coatcheck:circular-buffer');

// marks a slot outside the live range; elements themselves may be undefined
const EMPTY = Symbol('coatcheck.empty-slot');
type Slot<T> = T | typeof EMPTY;

const emptySlots = <T,>(length: number): Slot<T>[] =>
  new Array<Slot<T>>(length).fill(EMPTY);

/**
 * Base class for {@link RingBuffer} and {@link DoubleEndedArray}.
 *
 * Subclasses decide what happens when a slot is not available: the ring
 * reports failure, the double-ended array grows and retries.
 *
 * Iterating while mutating the store is not supported and is not detected.
 */
export abstract class CircularStore<T> implements Iterable<T> {
  private buffer: Slot<T>[];
  private headIndex = 0;
  private tailIndex = 0;

  protected constructor(backingLength: number) {
    this.buffer = emptySlots<T>(backingLength);
  }

  /**
   * Number of live elements
   */
  get count(): number {
    return this.tailIndex >= this.headIndex
      ? this.tailIndex - this.headIndex
      : this.buffer.length - this.headIndex + this.tailIndex;
  }

  get length(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.tailIndex === this.headIndex;
  }

  /**
   * Read the element at a logical index
   * O(1) operation
   * @throws {IndexOutOfRangeError} when `index` is not in `[0, count)`
   */
  at(index: number): T {
    return this.slotAt(index).slot;
  }

  /**
   * Overwrite the element at a logical index
   * @throws {IndexOutOfRangeError} when `index` is not in `[0, count)`
   */
  set(index: number, element: T): void {
    this.buffer[this.slotAt(index).physical] = element;
  }

  /**
   * Get the oldest element without removing it
   */
  peekFirst(): T | undefined {
    return this.isEmpty() ? undefined : this.at(0);
  }

  /**
   * Get the newest element without removing it
   */
  peekLast(): T | undefined {
    return this.isEmpty() ? undefined : this.at(this.count - 1);
  }

  /**
   * Remove and return the first element, or `undefined` when empty
   * O(1) operation
   */
  popFirst(): T | undefined {
    return this.isEmpty() ? undefined : this.takeFirst('popFirst');
  }

  /**
   * Remove and return the last element, or `undefined` when empty
   * O(1) operation
   */
  popLast(): T | undefined {
    return this.isEmpty() ? undefined : this.takeLast('popLast');
  }

  /**
   * Like {@link popFirst}, for callers that know the store is not empty
   * @throws {EmptyCollectionError} when the store is empty
   */
  removeFirst(): T {
    return this.takeFirst('removeFirst');
  }

  /**
   * Like {@link popLast}, for callers that know the store is not empty
   * @throws {EmptyCollectionError} when the store is empty
   */
  removeLast(): T {
    return this.takeLast('removeLast');
  }

  /**
   * Get all elements as an array, first to last
   * O(n) operation
   */
  toArray(): T[] {
    return Array.from(this);
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let index = 0; index < this.count; index++) {
      yield this.at(index);
    }
  }

  /**
   * Place `element` behind the last element if a slot is free
   */
  protected tryAppend(element: T): boolean {
    if (this.isEmpty() || this.next(this.tailIndex) !== this.headIndex) {
      this.buffer[this.tailIndex] = element;
      this.tailIndex = this.next(this.tailIndex);
      return true;
    }
    return false;
  }

  /**
   * Place `element` before the first element if a slot is free
   */
  protected tryPrepend(element: T): boolean {
    if (this.isEmpty() || this.previous(this.headIndex) !== this.tailIndex) {
      this.headIndex = this.previous(this.headIndex);
      this.buffer[this.headIndex] = element;
      return true;
    }
    return false;
  }

  /**
   * Move the live elements into a fresh backing array of `backingLength`
   * slots, first element at physical index 0.
   *
   * `backingLength` must be greater than `count`.
   */
  protected reallocate(backingLength: number): void {
    const previousLength = this.buffer.length;
    const buffer = emptySlots<T>(backingLength);

    let tailIndex = 0;
    while (this.headIndex !== this.tailIndex) {
      buffer[tailIndex] = this.buffer[this.headIndex];
      this.headIndex = this.next(this.headIndex);
      tailIndex++;
    }

    this.buffer = buffer;
    this.headIndex = 0;
    this.tailIndex = tailIndex;

    debug(`Reallocated backing store from ${previousLength} to ${backingLength} slots`);
  }

  /**
   * Drop every element and start over with `backingLength` empty slots
   */
  protected reset(backingLength: number): void {
    this.buffer = emptySlots<T>(backingLength);
    this.headIndex = 0;
    this.tailIndex = 0;
  }

  /**
   * Copy the state of `source` into this instance. Used by `clone()`.
   */
  protected copyFrom(source: CircularStore<T>): void {
    this.buffer = source.buffer.slice();
    this.headIndex = source.headIndex;
    this.tailIndex = source.tailIndex;
  }

  protected get backingLength(): number {
    return this.buffer.length;
  }

  private slotAt(index: number): { slot: T; physical: number } {
    const count = this.count;
    const physical = (this.headIndex + index) % this.buffer.length;
    const slot =
      Number.isInteger(index) && index >= 0 && index < count ? this.buffer[physical] : EMPTY;
    precondition(slot !== EMPTY, () => new IndexOutOfRangeError(index, count));
    return { slot, physical };
  }

  // every slot outside the live range holds EMPTY, so an empty store fails here
  private takeFirst(operation: string): T {
    const slot = this.buffer[this.headIndex];
    precondition(slot !== EMPTY, () => new EmptyCollectionError(operation));
    this.buffer[this.headIndex] = EMPTY;
    this.headIndex = this.next(this.headIndex);
    return slot;
  }

  private takeLast(operation: string): T {
    const lastIndex = this.previous(this.tailIndex);
    const slot = this.buffer[lastIndex];
    precondition(slot !== EMPTY, () => new EmptyCollectionError(operation));
    this.buffer[lastIndex] = EMPTY;
    this.tailIndex = lastIndex;
    return slot;
  }

  private next(index: number): number {
    return (index + 1) % this.buffer.length;
  }

  private previous(index: number): number {
    return (index - 1 + this.buffer.length) % this.buffer.length;
  }
}
