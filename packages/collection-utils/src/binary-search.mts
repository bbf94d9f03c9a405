export type Comparator<T> = (a: T, b: T) => number;

type NaturallyOrdered = number | string | bigint;

const naturalOrder = <T extends NaturallyOrdered>(a: T, b: T): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Find `element` in a sequence sorted ascending by `compare`.
 * O(log n) operation
 *
 * @returns the index of a matching element, or `undefined` when there is none.
 * With duplicates, any one of the matching indexes may be returned.
 */
export function binarySearchBy<T>(
  sorted: ArrayLike<T>,
  element: T,
  compare: Comparator<T>,
): number | undefined {
  let low = 0;
  let high = sorted.length;

  while (low < high) {
    const mid = low + ((high - low) >> 1);
    const order = compare(sorted[mid], element);
    if (order < 0) {
      low = mid + 1;
    } else if (order > 0) {
      high = mid;
    } else {
      return mid;
    }
  }
  return undefined;
}

/**
 * {@link binarySearchBy} for numbers, strings and bigints in ascending
 * natural order
 */
export function binarySearch<T extends NaturallyOrdered>(
  sorted: ArrayLike<T>,
  element: T,
): number | undefined {
  return binarySearchBy(sorted, element, naturalOrder);
}
