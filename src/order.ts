import {
  IncomparableTypeError,
  type Comparator,
  type ElementType,
  type HeapMode,
} from './common';

/**
 * Returns the natural element type of a value, or `undefined` if the value has no natural ordering.
 * `NaN` has none, since it compares false against everything including itself.
 */
export function comparableTypeOf(value: unknown): ElementType | undefined {
  switch (typeof value) {
    case 'number':
      return Number.isNaN(value) ? undefined : 'number';
    case 'bigint':
      return 'bigint';
    case 'string':
      return 'string';
    default:
      return undefined;
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'number' && Number.isNaN(value)) {
    return 'NaN';
  }
  return value === null ? 'null' : typeof value;
}

/**
 * Natural ordering over numbers, bigints and strings.
 *
 * Both arguments must share one of those types; mixing them, or passing anything else, throws
 * {@link IncomparableTypeError}.
 *
 * @category Ordering
 */
export function naturalOrder<T>(a: T, b: T): number {
  if (typeof a === 'number' && typeof b === 'number') {
    if (!Number.isNaN(a) && !Number.isNaN(b)) {
      return compareScalar(a, b);
    }
  } else if (typeof a === 'bigint' && typeof b === 'bigint') {
    return compareScalar(a, b);
  } else if (typeof a === 'string' && typeof b === 'string') {
    return compareScalar(a, b);
  }
  throw new IncomparableTypeError(
    `Cannot compare ${describeValue(a)} with ${describeValue(b)}`
  );
}

function compareScalar<S extends number | bigint | string>(a: S, b: S): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Flips the direction of a comparator. */
export function reverse<T>(comparator: Comparator<T>): Comparator<T> {
  return (a, b) => comparator(b, a);
}

/**
 * Builds the predicate consulted by every sift step: `better(a, b)` is true when `a` belongs closer to the root
 * than `b`. Ties are never better, so equal elements are not swapped.
 *
 * @category Ordering
 */
export function betterThan<T>(
  comparator: Comparator<T>,
  mode: HeapMode
): (a: T, b: T) => boolean {
  return mode === 'max'
    ? (a, b) => comparator(a, b) > 0
    : (a, b) => comparator(a, b) < 0;
}
