/**
 * Mutable state behind a pooled column: the reference array, the pool, and
 * an auxiliary key-to-slot index.
 *
 * Every value entering the pool goes through `traits.copy` when the traits
 * define one, so the keys in the index cannot drift from the values.
 *
 * The index answers "which slot holds this value" in O(1) and always agrees
 * with a first-match linear scan of the pool, including after a slot is
 * overwritten in place.
 *
 * @module pool-state
 */

import { MISSING_REF } from './constants.js';
import { PoolCapacityError } from './errors.js';
import type { Logger } from './logging-types.js';
import { refCapacity, refWidthOf, type RefArray, type RefWidth } from './refs.js';
import type { ElementTraits, PoolKey } from './traits.js';

/** SameValueZero, the equality Map keys use */
function sameKey(a: PoolKey, b: PoolKey): boolean {
  return a === b || (a !== a && b !== b);
}

export class PoolState<T> {
  private readonly slots = new Map<PoolKey, number>();

  readonly pool: T[];

  constructor(
    readonly refs: RefArray,
    pool: readonly T[],
    readonly traits: ElementTraits<T>,
    readonly logger: Logger
  ) {
    this.pool = pool.map(value => this.own(value));
    for (let i = 0; i < pool.length; i++) {
      const key = traits.key(this.pool[i]);
      if (!this.slots.has(key)) this.slots.set(key, i + 1);
    }
  }

  get width(): RefWidth {
    return refWidthOf(this.refs);
  }

  get capacity(): number {
    return refCapacity(this.width);
  }

  /**
   * 1-based slot holding `value`, or 0 when the pool lacks it.
   */
  slotOf(value: T): number {
    return this.slots.get(this.traits.key(value)) ?? MISSING_REF;
  }

  /**
   * Throws unless one more slot fits the reference width.
   */
  assertCanGrow(): void {
    if (this.pool.length + 1 > this.capacity) {
      throw PoolCapacityError.exceeded(this.pool.length + 1, this.capacity, this.width);
    }
  }

  /**
   * Append `value` as a new last slot and return that slot.
   *
   * @throws {PoolCapacityError} before anything changes
   */
  append(value: T): number {
    this.assertCanGrow();
    const owned = this.own(value);
    this.pool.push(owned);
    const slot = this.pool.length;
    const key = this.traits.key(owned);
    if (!this.slots.has(key)) this.slots.set(key, slot);
    this.logger.debug('Pool grew', { operation: 'append', slot, poolSize: slot });
    return slot;
  }

  /**
   * Overwrite slot `slot` in place. Every reference to it now decodes to `value`.
   */
  overwrite(slot: number, value: T): void {
    const previousKey = this.traits.key(this.pool[slot - 1]);
    const owned = this.own(value);
    this.pool[slot - 1] = owned;

    if (this.slots.get(previousKey) === slot) {
      this.slots.delete(previousKey);
      for (let i = slot; i < this.pool.length; i++) {
        if (sameKey(this.traits.key(this.pool[i]), previousKey)) {
          this.slots.set(previousKey, i + 1);
          break;
        }
      }
    }

    const key = this.traits.key(owned);
    const existing = this.slots.get(key);
    if (existing === undefined || existing > slot) this.slots.set(key, slot);
  }

  /**
   * Point every reference equal to `from` at `to`. Returns how many changed.
   */
  repoint(from: number, to: number): number {
    let changed = 0;
    for (let i = 0; i < this.refs.length; i++) {
      if (this.refs[i] === from) {
        this.refs[i] = to;
        changed++;
      }
    }
    return changed;
  }

  private own(value: T): T {
    return this.traits.copy ? this.traits.copy(value) : value;
  }

  hasMissing(): boolean {
    return this.refs.includes(MISSING_REF);
  }
}
