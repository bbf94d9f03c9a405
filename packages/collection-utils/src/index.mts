/**
 * Helpers used alongside the coatcheck collections: a bitset, a generic
 * binary search and an order-preserving parallel map
 *
 * @packageDocumentation
 */

export { BitSet } from "./bitset.mjs";
export { binarySearch, binarySearchBy } from "./binary-search.mjs";
export type { Comparator } from "./binary-search.mjs";
export { parallelMap } from "./parallel-map.mjs";
export type { ParallelMapOptions } from "./parallel-map.mjs";
export { poolRunTasks } from "./pool.mjs";
export type { PoolRunTasksOptions } from "./pool.mjs";
