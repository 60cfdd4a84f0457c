/**
 * Replace engine
 *
 * In-place substitution of one value by another across a pooled column.
 * Transitions, keyed on whether each operand is missing or concrete:
 *
 * | from                   | to                  | effect                                   |
 * |------------------------|---------------------|------------------------------------------|
 * | missing                | missing             | nothing                                  |
 * | concrete, not pooled   | anything            | ReplaceSourceNotFoundError               |
 * | concrete at slot f     | missing             | refs == f become 0, pool unchanged       |
 * | missing                | concrete at slot t  | refs == 0 become t                       |
 * | missing                | concrete, new       | append at t, refs == 0 become t          |
 * | concrete at slot f     | concrete at slot t  | refs == f become t, slot f is orphaned   |
 * | concrete at slot f     | concrete, new       | slot f is overwritten with the new value |
 *
 * Merging repoints references and leaves a stale slot behind; renaming
 * rewrites the slot itself. Both keep every reference within the pool.
 *
 * @module replace
 */

import { MISSING_REF } from './constants.js';
import { ReplaceSourceNotFoundError } from './errors.js';
import type { PoolState } from './pool-state.js';
import type { PooledColumn } from './pooled-column.js';
import { NA, type Maybe } from './types.js';

/**
 * Replace every occurrence of `from` with `to`.
 *
 * @returns `to`
 * @throws {ReplaceSourceNotFoundError} before any mutation when `from` is concrete and not pooled
 * @throws {PoolCapacityError} before any mutation when appending `to` would overflow the width
 */
export function replaceInPool<T>(state: PoolState<T>, from: Maybe<T>, to: Maybe<T>): Maybe<T> {
  if (from === NA) {
    if (to === NA) return NA;

    const existing = state.slotOf(to);
    const slot = existing !== MISSING_REF ? existing : state.append(to);
    const changed = state.repoint(MISSING_REF, slot);
    state.logger.debug('Replaced missing values', { operation: 'replace', slot, rows: changed });
    return to;
  }

  const fromSlot = state.slotOf(from);
  if (fromSlot === MISSING_REF) {
    throw new ReplaceSourceNotFoundError(from);
  }

  if (to === NA) {
    const changed = state.repoint(fromSlot, MISSING_REF);
    state.logger.debug('Replaced value with missing', { operation: 'replace', slot: fromSlot, rows: changed });
    return NA;
  }

  const toSlot = state.slotOf(to);
  if (toSlot === MISSING_REF) {
    state.overwrite(fromSlot, to);
    state.logger.debug('Renamed pool slot', { operation: 'replace', slot: fromSlot });
    return to;
  }

  if (toSlot !== fromSlot) {
    const changed = state.repoint(fromSlot, toSlot);
    state.logger.debug('Merged pool slot', {
      operation: 'replace',
      slot: toSlot,
      orphanedSlot: fromSlot,
      rows: changed,
    });
  }
  return to;
}

/**
 * Free-function form of `column.replace(from, to)`.
 */
export function replace<T>(column: PooledColumn<T>, from: Maybe<T>, to: Maybe<T>): Maybe<T> {
  return column.replace(from, to);
}
