/**
 * Error classes for contract violations in the collection packages
 *
 * Everything thrown from here signals programmer error. Expected absence
 * (popping an empty buffer, looking up an unknown id) is reported as
 * `undefined` or `false` by the collections themselves and never reaches
 * these classes.
 */

export type CollectionErrorCode =
  | 'INDEX_OUT_OF_RANGE'
  | 'EMPTY_COLLECTION'
  | 'INVALID_CAPACITY'
  | 'PARALLEL_MAP_FAILED';

/**
 * Base error class for all collection errors
 */
export class CollectionError extends Error {
  constructor(
    message: string,
    public readonly code: CollectionErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CollectionError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a positional read or write falls outside `[0, count)`
 */
export class IndexOutOfRangeError extends CollectionError {
  constructor(
    public readonly index: number,
    public readonly count: number
  ) {
    super(
      `Index ${index} is out of range for a collection of ${count} element(s)`,
      'INDEX_OUT_OF_RANGE',
      { index, count }
    );
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Thrown by `removeFirst`/`removeLast` on an empty collection
 */
export class EmptyCollectionError extends CollectionError {
  constructor(public readonly operation: string) {
    super(
      `Cannot ${operation} on an empty collection`,
      'EMPTY_COLLECTION',
      { operation }
    );
    this.name = 'EmptyCollectionError';
  }
}

/**
 * Thrown when a size, capacity or tuning option is outside its allowed range
 */
export class InvalidCapacityError extends CollectionError {
  constructor(
    message: string,
    public readonly option: string,
    public readonly value: unknown
  ) {
    super(message, 'INVALID_CAPACITY', { option, value });
    this.name = 'InvalidCapacityError';
  }
}

/**
 * Thrown when a transform fails inside a parallel map worker
 */
export class ParallelMapError extends CollectionError {
  constructor(
    public readonly blockIndex: number,
    public readonly reason: string
  ) {
    super(
      `Parallel map failed on block ${blockIndex}: ${reason}`,
      'PARALLEL_MAP_FAILED',
      { blockIndex, reason }
    );
    this.name = 'ParallelMapError';
  }
}

/**
 * Throws the error built by `createError` unless `condition` holds.
 * The error is only constructed on failure.
 */
export function precondition(
  condition: boolean,
  createError: () => CollectionError
): asserts condition {
  if (!condition) {
    throw createError();
  }
}

export function isCollectionError(error: unknown): error is CollectionError {
  return error instanceof CollectionError;
}
