import seedrandom from 'seedrandom';
import { expect } from 'vitest';
import type { Comparator, HeapMode } from './common';
import type { Heap } from './heap';
import { betterThan, naturalOrder } from './order';

/**
 * Asserts the heap property over the heap's backing layout: no element is better than its parent.
 */
export function expectHeapProperty<T>(
  heap: Heap<T>,
  comparator: Comparator<T> = naturalOrder
): void {
  const better = betterThan(comparator, heap.mode);
  const layout = heap.toArray();
  for (let i = 1; i < layout.length; i++) {
    const parent = Math.floor((i - 1) / 2);
    expect(
      better(layout[i]!, layout[parent]!),
      `element at ${i} outranks its parent at ${parent}: ${String(layout[i])} vs ${String(layout[parent])}`
    ).toBe(false);
  }
}

/** Extracts every element, returning them in extraction order. */
export function drain<T>(heap: Heap<T>): T[] {
  const out: T[] = [];
  while (!heap.isEmpty()) {
    out.push(heap.extract());
  }
  return out;
}

/** The order a full drain must produce for numeric input. */
export function sortedFor(mode: HeapMode, values: readonly number[]): number[] {
  return values
    .slice()
    .sort((a, b) => (mode === 'max' ? b - a : a - b));
}

/** Deterministic generator so that randomized tests replay identically. */
export class SeededRandom {
  readonly #rng: seedrandom.PRNG;

  constructor(seed: string = 'heap-seed') {
    this.#rng = seedrandom(seed);
  }

  /** integer on [min, max] */
  int(min: number, max: number): number {
    return Math.floor(min + this.#rng.quick() * (max - min + 1));
  }

  ints(count: number, min: number, max: number): number[] {
    return Array.from({ length: count }, () => this.int(min, max));
  }
}
