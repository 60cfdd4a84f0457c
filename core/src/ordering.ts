/**
 * Ordering helper
 *
 * Sorting a pooled column happens on its references. The grouping or
 * counting-sort step that produces the permutation is supplied by the
 * caller as a `SortIndexer`; this module only validates the permutation and
 * applies it.
 *
 * @module ordering
 */

import { ErrorCode, ValidationError } from './errors.js';
import type { PooledColumn } from './pooled-column.js';

/**
 * Computes a sort permutation from a reference array and its pool size.
 * References range over 0..poolSize, with 0 for missing elements.
 */
export type SortIndexer = (refs: ArrayLike<number>, poolSize: number) => readonly number[];

function invalidPermutation(message: string, details: Record<string, unknown>): ValidationError {
  return new ValidationError(
    message,
    ErrorCode.INVALID_PERMUTATION,
    details,
    'The sort indexer must return each index 0..length-1 exactly once'
  );
}

/**
 * @throws {ValidationError} INVALID_PERMUTATION unless `order` holds each of 0..length-1 once
 */
export function assertPermutation(order: readonly number[], length: number): void {
  if (order.length !== length) {
    throw invalidPermutation(`Permutation has ${order.length} entries for ${length} elements`, {
      expected: length,
      actual: order.length,
    });
  }
  const seen = new Uint8Array(length);
  for (let i = 0; i < order.length; i++) {
    const index = order[i];
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw invalidPermutation(`Permutation entry ${index} at position ${i} is out of range`, {
        position: i,
        index,
        length,
      });
    }
    if (seen[index] === 1) {
      throw invalidPermutation(`Permutation repeats index ${index}`, { position: i, index });
    }
    seen[index] = 1;
  }
}

/**
 * The permutation that sorts `column`, as computed by `indexer` over the
 * column's references.
 */
export function orderColumn<T>(column: PooledColumn<T>, indexer: SortIndexer): readonly number[] {
  const order = indexer(column.refs, column.pool.length);
  assertPermutation(order, column.length);
  return order;
}

/**
 * A new column holding the elements of `column` in the order `indexer` gives.
 */
export function sortColumn<T>(column: PooledColumn<T>, indexer: SortIndexer): PooledColumn<T> {
  return column.take(orderColumn(column, indexer));
}
