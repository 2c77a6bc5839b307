/**
 * @categoryDescription Data Structure
 * Array-backed binary heaps with max or min ordering.
 * @module
 */
export { newHeap, buildHeap, BinaryHeap, type Heap } from './heap';
export {
  naturalOrder,
  reverse,
  betterThan,
  comparableTypeOf,
} from './order';
export {
  HeapError,
  EmptyHeapError,
  IncomparableTypeError,
  HeapIndexError,
  HeapConfigError,
  sameValueZero,
  type HeapOptions,
  type HeapMode,
  type ElementType,
  type EmptyReplacePolicy,
  type Comparator,
  type Equality,
} from './common';
