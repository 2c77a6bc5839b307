import {
  EmptyHeapError,
  HeapIndexError,
  IncomparableTypeError,
  _resolveOptions,
  type Comparator,
  type ElementType,
  type EmptyReplacePolicy,
  type Equality,
  type HeapMode,
  type HeapOptions,
} from './common';
import { betterThan, comparableTypeOf, naturalOrder } from './order';

/**
 * @category Data Structure
 * @summary Binary heap supporting both max-heap and min-heap ordering
 */
export interface Heap<Value> extends Iterable<Value> {
  /** Whether the root holds the greatest (`'max'`) or least (`'min'`) element */
  readonly mode: HeapMode;
  /** Get the current size of the heap */
  get size(): number;
  /** Whether the heap holds no elements */
  isEmpty(): boolean;
  /** Insert an element into the heap */
  insert(value: Value): void;
  /** Peek at the highest priority element without removing it. Throws {@link EmptyHeapError} when empty. */
  peek(): Value;
  /** Remove and return the highest priority element. Throws {@link EmptyHeapError} when empty. */
  extract(): Value;
  /**
   * Replace the highest priority element with `value` and return the element it replaced.
   *
   * On an empty heap this follows the `onEmptyReplace` option: `'throw'` raises {@link EmptyHeapError},
   * `'insert'` inserts `value` and returns `undefined`.
   */
  replaceRoot(value: Value): Value | undefined;
  /** Replace the first element equal to `oldValue` with `newValue`. Returns false if none matched. */
  update(oldValue: Value, newValue: Value): boolean;
  /** Remove the first element equal to `value`. Returns false if none matched. */
  remove(value: Value): boolean;
  /** Whether an element equal to `value` is present */
  contains(value: Value): boolean;
  /** Position of the first element equal to `value` in the backing layout, or -1 */
  indexOf(value: Value): number;
  /** Add many elements at once, restoring the heap property bottom-up */
  heapify(values: Iterable<Value>): void;
  /** Remove all elements */
  clear(): void;
  /** Copy of the backing array in heap layout (not sorted) */
  toArray(): Value[];
  /** Check the heap property at every non-root position */
  isValid(): boolean;
  /** Parent of the element at `index`, or `undefined` for the root. Throws {@link HeapIndexError} outside the heap. */
  parent(index: number): Value | undefined;
  /** Left child of the element at `index`, if any */
  leftChild(index: number): Value | undefined;
  /** Right child of the element at `index`, if any */
  rightChild(index: number): Value | undefined;
  /** Both children of the element at `index` */
  children(index: number): [Value | undefined, Value | undefined];
}

/**
 * Creates a new, empty {@link Heap}.
 *
 * @category Data Structure
 *
 * @example
 * ```typescript
 * const heap = newHeap<number>();
 * heap.insert(3);
 * heap.insert(9);
 * heap.extract(); // 9
 *
 * const tasks = newHeap<Task>({
 *   mode: 'min',
 *   comparator: (a, b) => a.deadline - b.deadline,
 * });
 * ```
 */
export function newHeap<Value>(options?: HeapOptions<Value>): Heap<Value> {
  return new BinaryHeap(options);
}

/**
 * Builds a {@link Heap} holding exactly `values`.
 *
 * The values are copied into the backing array as they are, then sifted down from the last parent to the root. This
 * is O(n); inserting them one at a time yields an equally valid heap but costs O(n log n).
 *
 * @category Data Structure
 */
export function buildHeap<Value>(
  values: Iterable<Value>,
  options?: HeapOptions<Value>
): Heap<Value> {
  const heap = new BinaryHeap(options);
  heap.heapify(values);
  return heap;
}

/**
 * Array-backed binary heap. The element at index `i` has children at `2i + 1` and `2i + 2`.
 * @category Data Structure
 */
export class BinaryHeap<Value> implements Heap<Value> {
  #data: Value[] = [];
  readonly #mode: HeapMode;
  readonly #better: (a: Value, b: Value) => boolean;
  readonly #equals: Equality<Value>;
  readonly #onEmptyReplace: EmptyReplacePolicy;
  /** no comparator was given; elements are type-checked on the way in */
  readonly #natural: boolean;
  readonly #configuredType: ElementType | undefined;
  #elementType: ElementType | undefined;

  constructor(options?: HeapOptions<Value>) {
    const resolved = _resolveOptions(options);
    this.#mode = resolved.mode;
    this.#natural = resolved.comparator == null;
    const comparator: Comparator<Value> = resolved.comparator ?? naturalOrder;
    this.#better = betterThan(comparator, this.#mode);
    this.#equals = resolved.equals;
    this.#onEmptyReplace = resolved.onEmptyReplace;
    this.#configuredType = resolved.elementType;
    this.#elementType = resolved.elementType;
  }

  get mode(): HeapMode {
    return this.#mode;
  }

  get size(): number {
    return this.#data.length;
  }

  isEmpty(): boolean {
    return this.#data.length === 0;
  }

  insert(value: Value): void {
    this.#admit([value]);
    const index = this.#data.length;
    this.#moveUp(value, index, this.#heapifyUp(value, index));
  }

  peek(): Value {
    if (this.#data.length === 0) {
      throw new EmptyHeapError('Cannot peek: heap is empty');
    }
    return this.#data[0]!;
  }

  extract(): Value {
    if (this.#data.length === 0) {
      throw new EmptyHeapError('Cannot extract: heap is empty');
    }

    if (this.#data.length === 1) {
      return this.#data.pop()!;
    }

    const root = this.#data[0]!;
    const lastIndex = this.#data.length - 1;
    const last = this.#data[lastIndex]!;
    const path = this.#heapifyDown(last, 0, lastIndex);
    this.#data.pop();
    this.#moveDown(last, 0, path);
    return root;
  }

  replaceRoot(value: Value): Value | undefined {
    if (this.#data.length === 0) {
      if (this.#onEmptyReplace === 'insert') {
        this.insert(value);
        return undefined;
      }
      throw new EmptyHeapError('Cannot replace root: heap is empty');
    }
    this.#admit([value]);
    const root = this.#data[0]!;
    this.#moveDown(value, 0, this.#heapifyDown(value, 0, this.#data.length));
    return root;
  }

  update(oldValue: Value, newValue: Value): boolean {
    const index = this.indexOf(oldValue);
    if (index === -1) {
      return false;
    }
    this.#admit([newValue]);
    this.#restore(newValue, index, this.#data.length)();
    return true;
  }

  remove(value: Value): boolean {
    const index = this.indexOf(value);
    if (index === -1) {
      return false;
    }
    const lastIndex = this.#data.length - 1;
    if (index === lastIndex) {
      this.#data.pop();
      return true;
    }
    const last = this.#data[lastIndex]!;
    const apply = this.#restore(last, index, lastIndex);
    this.#data.pop();
    apply();
    return true;
  }

  contains(value: Value): boolean {
    return this.indexOf(value) !== -1;
  }

  indexOf(value: Value): number {
    return this.#data.findIndex(item => this.#equals(item, value));
  }

  heapify(values: Iterable<Value>): void {
    const incoming = Array.from(values);
    this.#admit(incoming);
    const previous = this.#data;
    this.#data = previous.concat(incoming);
    try {
      for (let i = Math.floor(this.#data.length / 2) - 1; i >= 0; i--) {
        const value = this.#data[i]!;
        this.#moveDown(value, i, this.#heapifyDown(value, i, this.#data.length));
      }
    } catch (error) {
      // a throwing comparator leaves the old contents in place
      this.#data = previous;
      throw error;
    }
  }

  clear(): void {
    this.#data = [];
    this.#elementType = this.#configuredType;
  }

  toArray(): Value[] {
    return this.#data.slice();
  }

  *[Symbol.iterator](): Iterator<Value> {
    yield* this.#data.slice();
  }

  /** Parent of the element at `index`, or `undefined` for the root */
  parent(index: number): Value | undefined {
    this.#checkIndex(index);
    return index === 0 ? undefined : this.#data[parentOf(index)];
  }

  /** Left child of the element at `index`, if any */
  leftChild(index: number): Value | undefined {
    this.#checkIndex(index);
    return this.#data[2 * index + 1];
  }

  /** Right child of the element at `index`, if any */
  rightChild(index: number): Value | undefined {
    this.#checkIndex(index);
    return this.#data[2 * index + 2];
  }

  children(index: number): [Value | undefined, Value | undefined] {
    return [this.leftChild(index), this.rightChild(index)];
  }

  /** Check the heap property at every non-root position */
  isValid(): boolean {
    for (let i = 1; i < this.#data.length; i++) {
      if (this.#better(this.#data[i]!, this.#data[parentOf(i)]!)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Renders the tree one level per line, e.g.
   * ```
   * [12]
   * [10][5]
   * [8][7]
   * ```
   */
  toString(): string {
    if (this.#data.length === 0) {
      return '- Empty heap -';
    }
    const lines: string[] = [];
    for (let start = 0, width = 1; start < this.#data.length; width *= 2) {
      lines.push(
        this.#data
          .slice(start, start + width)
          .map(value => `[${String(value)}]`)
          .join('')
      );
      start += width;
    }
    return lines.join('\n');
  }

  /**
   * Naturally ordered heaps only hold one comparable type at a time. Values are checked as a batch before anything
   * is stored, so a rejected call leaves the heap untouched.
   */
  #admit(values: readonly Value[]): void {
    if (!this.#natural) {
      return;
    }
    let expected = this.#elementType;
    for (const value of values) {
      const actual = comparableTypeOf(value);
      if (actual == null) {
        throw new IncomparableTypeError(
          `Invalid element: ${String(value)}. Elements must be numbers, bigints or strings`
        );
      }
      if (expected != null && actual !== expected) {
        throw new IncomparableTypeError(
          `Invalid element type: expected ${expected}, received ${actual}`
        );
      }
      expected = actual;
    }
    this.#elementType = expected;
  }

  #checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.#data.length) {
      throw new HeapIndexError(index, this.#data.length);
    }
  }

  /**
   * Plans where `value` goes when it is written at `index` of a heap of `length` elements, and returns the writes
   * that put it there. Only one element changes, so at most one direction applies.
   */
  #restore(value: Value, index: number, length: number): () => void {
    if (index > 0 && this.#better(value, this.#data[parentOf(index)]!)) {
      const target = this.#heapifyUp(value, index);
      return () => this.#moveUp(value, index, target);
    }
    const path = this.#heapifyDown(value, index, length);
    return () => this.#moveDown(value, index, path);
  }

  // The sifts run in two phases: #heapifyUp and #heapifyDown only compare, #moveUp and #moveDown only write. A
  // comparator that throws therefore never leaves a half-moved element behind.

  /** Index that `value`, placed at `index`, climbs to. */
  #heapifyUp(value: Value, index: number): number {
    while (index > 0) {
      const parentIndex = parentOf(index);

      if (!this.#better(value, this.#data[parentIndex]!)) {
        break;
      }

      index = parentIndex;
    }
    return index;
  }

  /** Children that move up, in order, as `value` descends from `index` within the first `length` slots. */
  #heapifyDown(value: Value, index: number, length: number): number[] {
    const path: number[] = [];
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;

      if (leftChild >= length) {
        break;
      }

      // pick the better child first, then test it against the node
      let bestChild = leftChild;
      if (
        rightChild < length &&
        this.#better(this.#data[rightChild]!, this.#data[leftChild]!)
      ) {
        bestChild = rightChild;
      }

      if (!this.#better(this.#data[bestChild]!, value)) {
        break;
      }

      path.push(bestChild);
      index = bestChild;
    }
    return path;
  }

  #moveUp(value: Value, index: number, target: number): void {
    while (index > target) {
      const parentIndex = parentOf(index);
      this.#data[index] = this.#data[parentIndex]!;
      index = parentIndex;
    }
    this.#data[index] = value;
  }

  #moveDown(value: Value, index: number, path: readonly number[]): void {
    for (const child of path) {
      this.#data[index] = this.#data[child]!;
      index = child;
    }
    this.#data[index] = value;
  }
}

function parentOf(index: number): number {
  return Math.floor((index - 1) / 2);
}
