/**
 * @categoryDescription Common
 * Errors and option types shared by the heap and its helpers.
 * @module
 */

/**
 * Base error class for all errors thrown by this library
 */
export class HeapError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HeapError';
  }
}

/**
 * Error thrown when reading or removing the root of an empty heap
 */
export class EmptyHeapError extends HeapError {
  constructor(message: string = 'Heap is empty', options?: ErrorOptions) {
    super(message, options);
    this.name = 'EmptyHeapError';
  }
}

/**
 * Error thrown when two values cannot be ordered against each other
 */
export class IncomparableTypeError extends HeapError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IncomparableTypeError';
  }
}

/**
 * Error thrown when a tree position lies outside the heap
 */
export class HeapIndexError extends HeapError {
  constructor(index: number, size: number, options?: ErrorOptions) {
    super(`Index ${index} out of bounds for heap of size ${size}`, options);
    this.name = 'HeapIndexError';
  }
}

/**
 * Error thrown when a heap is constructed with invalid options
 */
export class HeapConfigError extends HeapError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HeapConfigError';
  }
}

/**
 * Which extreme the root holds.
 *
 * @category Common
 */
export type HeapMode = 'max' | 'min';

/** Element types that have a natural ordering. */
export type ElementType = 'number' | 'bigint' | 'string';

/** What {@link Heap.replaceRoot} does when there is no root to replace. */
export type EmptyReplacePolicy = 'throw' | 'insert';

/**
 * Comparison function type for heap ordering
 * Returns negative if a < b, positive if a > b, zero if a === b
 */
export type Comparator<T> = (a: T, b: T) => number;

/** Equality used by the linear scans (`contains`, `update`, `remove`). */
export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Options accepted by {@link newHeap}, {@link buildHeap} and the {@link BinaryHeap} constructor.
 *
 * @category Common
 */
export interface HeapOptions<T> {
  /** `'max'` keeps the greatest element at the root, `'min'` the least. Defaults to `'max'`. */
  mode?: HeapMode;
  /** custom ordering. When omitted, numbers, bigints and strings are ordered naturally. */
  comparator?: Comparator<T>;
  /** equality for the linear scans. Defaults to SameValueZero, the equality of `Array.prototype.includes`. */
  equals?: Equality<T>;
  /**
   * Restricts a naturally ordered heap to one element type. When omitted, the type of the first stored element is
   * locked in. Only `clear()` releases it; extracting or removing down to an empty heap keeps the lock. Cannot be
   * combined with {@link comparator}.
   */
  elementType?: ElementType;
  /** behavior of `replaceRoot` on an empty heap. Defaults to `'throw'`. */
  onEmptyReplace?: EmptyReplacePolicy;
}

const MODES: readonly HeapMode[] = ['max', 'min'];
const POLICIES: readonly EmptyReplacePolicy[] = ['throw', 'insert'];
const ELEMENT_TYPES: readonly ElementType[] = ['number', 'bigint', 'string'];

export interface ResolvedHeapOptions<T> {
  mode: HeapMode;
  comparator: Comparator<T> | undefined;
  equals: Equality<T>;
  elementType: ElementType | undefined;
  onEmptyReplace: EmptyReplacePolicy;
}

export function _resolveOptions<T>(
  options: HeapOptions<T> | undefined
): ResolvedHeapOptions<T> {
  const {
    mode = 'max',
    comparator,
    equals = sameValueZero,
    elementType,
    onEmptyReplace = 'throw',
  }: HeapOptions<T> = options ?? {};
  if (!MODES.includes(mode)) {
    throw new HeapConfigError(
      `Invalid heap mode: ${String(mode)}. Expected 'max' or 'min'`
    );
  }
  if (!POLICIES.includes(onEmptyReplace)) {
    throw new HeapConfigError(
      `Invalid onEmptyReplace policy: ${String(onEmptyReplace)}. Expected 'throw' or 'insert'`
    );
  }
  if (elementType != null) {
    if (!ELEMENT_TYPES.includes(elementType)) {
      throw new HeapConfigError(
        `Invalid element type: ${String(elementType)}. Expected one of ${ELEMENT_TYPES.join(', ')}`
      );
    }
    if (comparator != null) {
      throw new HeapConfigError(
        'elementType only applies to natural ordering and cannot be combined with a comparator'
      );
    }
  }
  return { mode, comparator, equals, elementType, onEmptyReplace };
}

/** SameValueZero: like `===`, except that `NaN` equals `NaN`. */
export function sameValueZero<T>(a: T, b: T): boolean {
  return a === b || (a !== a && b !== b);
}
