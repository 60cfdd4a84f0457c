/**
 * Levels extraction: the distinct-value view of a pooled column.
 *
 * @module levels
 */

import { MISSING_REF } from './constants.js';
import { NA, type Maybe } from './types.js';

/**
 * The minimal view levels need: a reference array and its pool.
 */
export interface PooledView<T> {
  readonly refs: ArrayLike<number>;
  readonly pool: readonly T[];
}

function anyMissing(refs: ArrayLike<number>): boolean {
  for (let i = 0; i < refs.length; i++) {
    if (refs[i] === MISSING_REF) return true;
  }
  return false;
}

/**
 * The pool in slot order, with one trailing missing marker when any
 * reference is missing. Orphaned slots are kept.
 */
export function unique<T>(column: PooledView<T>): Maybe<T>[] {
  const result: Maybe<T>[] = [...column.pool];
  if (anyMissing(column.refs)) {
    result.push(NA);
  }
  return result;
}

/** Alias of {@link unique} */
export const levels = unique;
