import { describe, expect, test } from 'vitest';
import {
  _resolveOptions,
  EmptyHeapError,
  HeapConfigError,
  HeapError,
  HeapIndexError,
  IncomparableTypeError,
  sameValueZero,
  type HeapOptions,
} from './common';

describe('errors', () => {
  test('every error extends HeapError and sets its name', () => {
    const errors = [
      new EmptyHeapError(),
      new IncomparableTypeError('bad'),
      new HeapIndexError(3, 2),
      new HeapConfigError('bad'),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(HeapError);
      expect(error).toBeInstanceOf(Error);
    }
    expect(errors.map(e => e.name)).toEqual([
      'EmptyHeapError',
      'IncomparableTypeError',
      'HeapIndexError',
      'HeapConfigError',
    ]);
  });

  test('EmptyHeapError has a default message', () => {
    expect(new EmptyHeapError().message).toBe('Heap is empty');
  });

  test('HeapIndexError reports the index and size', () => {
    expect(new HeapIndexError(7, 4).message).toBe(
      'Index 7 out of bounds for heap of size 4'
    );
  });

  test('errors carry a cause', () => {
    const cause = new Error('root cause');
    expect(new HeapError('wrapped', { cause }).cause).toBe(cause);
  });
});

describe('_resolveOptions', () => {
  test('fills in defaults', () => {
    const resolved = _resolveOptions<number>(undefined);
    expect(resolved.mode).toBe('max');
    expect(resolved.onEmptyReplace).toBe('throw');
    expect(resolved.comparator).toBeUndefined();
    expect(resolved.elementType).toBeUndefined();
    expect(resolved.equals).toBe(sameValueZero);
  });

  test('keeps explicit options', () => {
    const comparator = (a: number, b: number) => a - b;
    const resolved = _resolveOptions<number>({
      mode: 'min',
      comparator,
      onEmptyReplace: 'insert',
    });
    expect(resolved.mode).toBe('min');
    expect(resolved.comparator).toBe(comparator);
    expect(resolved.onEmptyReplace).toBe('insert');
  });

  test('rejects an unknown mode', () => {
    const options = { mode: 'middle' } as unknown as HeapOptions<number>;
    expect(() => _resolveOptions(options)).toThrow(HeapConfigError);
    expect(() => _resolveOptions(options)).toThrow(
      "Invalid heap mode: middle. Expected 'max' or 'min'"
    );
  });

  test('rejects an unknown onEmptyReplace policy', () => {
    const options = {
      onEmptyReplace: 'ignore',
    } as unknown as HeapOptions<number>;
    expect(() => _resolveOptions(options)).toThrow(HeapConfigError);
  });

  test('rejects an unsupported element type', () => {
    const options = { elementType: 'boolean' } as unknown as HeapOptions<number>;
    expect(() => _resolveOptions(options)).toThrow(
      'Invalid element type: boolean. Expected one of number, bigint, string'
    );
  });

  test('rejects elementType combined with a comparator', () => {
    expect(() =>
      _resolveOptions<number>({
        elementType: 'number',
        comparator: (a, b) => a - b,
      })
    ).toThrow(HeapConfigError);
  });
});

describe('sameValueZero', () => {
  test('matches strict equality except for NaN', () => {
    expect(sameValueZero(1, 1)).toBe(true);
    expect(sameValueZero('a', 'b')).toBe(false);
    expect(sameValueZero(NaN, NaN)).toBe(true);
    expect(sameValueZero(0, -0)).toBe(true);
  });

  test('compares objects by identity', () => {
    const item = { id: 1 };
    expect(sameValueZero(item, item)).toBe(true);
    expect(sameValueZero(item, { id: 1 })).toBe(false);
  });
});
