/**
 * Ordering helper tests
 *
 * The indexer here is a stable counting sort over references, the kind of
 * grouping step callers plug in.
 */

import { describe, it, expect } from 'vitest';
import { assertPermutation, orderColumn, sortColumn, type SortIndexer } from '../ordering.js';
import { pooled } from '../factory.js';
import { ErrorCode, ValidationError } from '../errors.js';

const countingSort: SortIndexer = (refs, poolSize) => {
  const counts = new Array<number>(poolSize + 2).fill(0);
  for (let i = 0; i < refs.length; i++) counts[refs[i] + 1]++;
  for (let r = 1; r < counts.length; r++) counts[r] += counts[r - 1];
  const order = new Array<number>(refs.length);
  for (let i = 0; i < refs.length; i++) order[counts[refs[i]]++] = i;
  return order;
};

function permutationCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.code;
    throw error;
  }
  return undefined;
}

describe('orderColumn', () => {
  it('should return the permutation computed over references', () => {
    const column = pooled(['c', null, 'a', 'c', 'b']);
    expect(orderColumn(column, countingSort)).toEqual([1, 2, 4, 0, 3]);
  });

  it('should pass the pool size to the indexer', () => {
    const column = pooled(['a', 'b', 'a']);
    let seen = -1;
    orderColumn(column, (refs, poolSize) => {
      seen = poolSize;
      return Array.from(refs, (_, i) => i);
    });
    expect(seen).toBe(2);
  });

  it('should reject an indexer result that is not a permutation', () => {
    const column = pooled(['a', 'b']);

    expect(permutationCode(() => orderColumn(column, () => [0]))).toBe(ErrorCode.INVALID_PERMUTATION);
    expect(permutationCode(() => orderColumn(column, () => [0, 0]))).toBe(ErrorCode.INVALID_PERMUTATION);
    expect(permutationCode(() => orderColumn(column, () => [0, 2]))).toBe(ErrorCode.INVALID_PERMUTATION);
  });
});

describe('sortColumn', () => {
  it('should sort missing elements first, then by pool order', () => {
    const column = pooled(['c', null, 'a', 'c', 'b']);
    const sorted = sortColumn(column, countingSort);

    expect(sorted.toArray()).toEqual([null, 'a', 'b', 'c', 'c']);
    expect(sorted.pool).toEqual(column.pool);
  });

  it('should follow appended slots rather than value order', () => {
    const column = pooled(['m', 'n']);
    column.set(0, 'a');

    expect(sortColumn(column, countingSort).toArray()).toEqual(['n', 'a']);
  });

  it('should sort an empty column', () => {
    expect(sortColumn(pooled([]), countingSort).length).toBe(0);
  });
});

describe('assertPermutation', () => {
  it('should accept each index exactly once', () => {
    expect(() => assertPermutation([2, 0, 1], 3)).not.toThrow();
  });

  it('should reject fractional entries', () => {
    expect(() => assertPermutation([0.5, 1], 2)).toThrow(
      'Permutation entry 0.5 at position 0 is out of range'
    );
  });
});
