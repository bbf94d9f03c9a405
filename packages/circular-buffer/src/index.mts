/**
 * Circular-buffer based double-ended queues: a fixed-capacity ring buffer
 * and a growable double-ended array sharing one modular-index core
 *
 * @packageDocumentation
 */

export { CircularStore } from './circular-store.mjs';
export { RingBuffer } from './ring-buffer.mjs';
export {
  DoubleEndedArray,
  GROWTH_FACTOR,
  DEFAULT_INITIAL_CAPACITY
} from './double-ended-array.mjs';
export type { DoubleEndedArrayOptions } from './double-ended-array.mjs';
