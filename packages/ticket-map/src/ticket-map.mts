/**
 * Ticket map (the "Russian coatcheck" structure)
 *
 * Hands out a stable integer id for every stored element. Ids increase
 * monotonically and are never reused, so the backing array stays sorted by
 * id for free and lookups are a binary search. Removal leaves a tombstone in
 * place; tombstones are swept out once live elements fall below a fraction
 * of the backing array.
 *
 * Suited to things that are tracked by id and go away after a while, like
 * connections or in-flight requests, and that also need cheap iteration over
 * everything still alive.
 *
 * @example
 * ```typescript
 * const connections = new TicketMap<Socket>();
 * const id = connections.append(socket);
 * connections.get(id); // => socket
 * connections.remove(id); // => socket
 * connections.get(id); // => undefined
 * ```
 */

import { InvalidCapacityError, precondition } from '@coatcheck/errors';
import { debuglog } from 'util';

const debug = debuglog('coatcheck:ticket-map');

/**
 * Compaction runs when live elements drop below this fraction of the slots
 */
export const COMPACTION_THRESHOLD = 0.5;

export interface TicketMapOptions {
  /** Fraction in (0, 1] of live slots under which tombstones are swept (default: 0.5) */
  compactionThreshold?: number;
}

type TicketSlot<T> =
  | { readonly id: number; readonly live: true; readonly element: T }
  | { readonly id: number; readonly live: false };

export class TicketMap<T> implements Iterable<T> {
  private slots: TicketSlot<T>[] = [];
  private liveCount = 0;
  private currentId = 0;
  private readonly compactionThreshold: number;

  constructor(options?: TicketMapOptions) {
    const compactionThreshold = options?.compactionThreshold ?? COMPACTION_THRESHOLD;
    precondition(
      compactionThreshold > 0 && compactionThreshold <= 1,
      () =>
        new InvalidCapacityError(
          `The compaction threshold must be in (0, 1], got ${compactionThreshold}`,
          'compactionThreshold',
          compactionThreshold
        )
    );
    this.compactionThreshold = compactionThreshold;
  }

  /**
   * Number of live elements
   */
  get size(): number {
    return this.liveCount;
  }

  /**
   * Number of slots in the backing array, tombstones included
   */
  get slotCount(): number {
    return this.slots.length;
  }

  /**
   * The id the next appended element will receive
   */
  get nextId(): number {
    return this.currentId;
  }

  isEmpty(): boolean {
    return this.liveCount === 0;
  }

  /**
   * Store an element and return its id
   * O(1) operation
   */
  append(element: T): number {
    const id = this.currentId;
    this.slots.push({ id, live: true, element });
    this.liveCount++;
    this.currentId++;
    return id;
  }

  /**
   * Store every element of a sequence
   * @returns the assigned ids, in input order
   */
  appendAll(elements: Iterable<T>): number[] {
    const ids: number[] = [];
    for (const element of elements) {
      ids.push(this.append(element));
    }
    return ids;
  }

  /**
   * Look up an element by id
   * O(log n) operation
   *
   * Returns `undefined` both for ids that were never issued and for ids that
   * were removed; the two cases are not distinguishable here.
   */
  get(id: number): T | undefined {
    const index = this.findIndex(id);
    if (index === undefined) {
      return undefined;
    }
    const slot = this.slots[index];
    return slot.live ? slot.element : undefined;
  }

  /**
   * Remove an element by id
   * O(log n) lookup, amortized O(1) compaction
   *
   * @returns the removed element, or `undefined` when the id is unknown or
   * already removed
   */
  remove(id: number): T | undefined {
    const index = this.findIndex(id);
    if (index === undefined) {
      return undefined;
    }
    const slot = this.slots[index];
    if (!slot.live) {
      return undefined;
    }

    this.slots[index] = { id, live: false };
    this.liveCount--;

    if (this.liveCount < Math.floor(this.slots.length * this.compactionThreshold)) {
      this.compact();
    }
    return slot.element;
  }

  /**
   * Position of `id` in the backing array, tombstoned or not
   * O(log n) operation
   */
  findIndex(id: number): number | undefined {
    let lowerBound = 0;
    let upperBound = this.slots.length;

    while (lowerBound < upperBound) {
      const midIndex = lowerBound + ((upperBound - lowerBound) >> 1);
      const midId = this.slots[midIndex].id;
      if (midId === id) {
        return midIndex;
      } else if (midId < id) {
        lowerBound = midIndex + 1;
      } else {
        upperBound = midIndex;
      }
    }
    return undefined;
  }

  /**
   * Live `[id, element]` pairs in id order
   */
  *entries(): Generator<[number, T]> {
    for (const slot of this.slots) {
      if (slot.live) {
        yield [slot.id, slot.element];
      }
    }
  }

  /**
   * Live ids in ascending order
   */
  *ids(): Generator<number> {
    for (const [id] of this.entries()) {
      yield id;
    }
  }

  /**
   * Live elements in id (insertion) order; tombstones are skipped.
   * Mutating the map while iterating is not supported.
   */
  *[Symbol.iterator](): Iterator<T> {
    for (const [, element] of this.entries()) {
      yield element;
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }

  /**
   * Independent copy with the same ids and the same next id
   */
  clone(): TicketMap<T> {
    const copy = new TicketMap<T>({ compactionThreshold: this.compactionThreshold });
    // slots are replaced, never mutated, so sharing them is safe
    copy.slots = this.slots.slice();
    copy.liveCount = this.liveCount;
    copy.currentId = this.currentId;
    return copy;
  }

  private compact(): void {
    const before = this.slots.length;
    this.slots = this.slots.filter((slot) => slot.live);
    debug(`Compacted ticket map from ${before} to ${this.slots.length} slots`);
  }
}
