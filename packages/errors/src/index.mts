/**
 * Shared contract-violation errors for the coatcheck collections
 *
 * @packageDocumentation
 */

export {
  CollectionError,
  IndexOutOfRangeError,
  EmptyCollectionError,
  InvalidCapacityError,
  ParallelMapError,
  precondition,
  isCollectionError
} from './errors.mjs';

export type { CollectionErrorCode } from './errors.mjs';
