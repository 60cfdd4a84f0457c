/**
 * Dense column: decoded values plus a missing mask.
 *
 * The plain counterpart of PooledColumn. It is what pooled columns decode
 * into and what builders accept alongside raw arrays.
 *
 * @module dense-column
 */

import { ValidationError } from './errors.js';
import { assertIndex, resolveSelector } from './selection.js';
import { NA, type Column, type Maybe, type Selector } from './types.js';

export class DenseColumn<T> implements Column<T> {
  private readonly values: Maybe<T>[];
  private readonly mask: boolean[];

  /**
   * @param values - Element values; `null` or `undefined` entries are missing
   * @param mask - Optional missingness mask, true where an element is missing
   * @throws {ValidationError} LENGTH_MISMATCH when the mask length differs
   */
  constructor(values: readonly (T | null | undefined)[], mask?: readonly boolean[]) {
    if (mask !== undefined && mask.length !== values.length) {
      throw ValidationError.lengthMismatch('mask', values.length, mask.length);
    }
    this.values = [];
    this.mask = [];
    for (let i = 0; i < values.length; i++) {
      const value = values[i];
      if (value === null || value === undefined || mask?.[i] === true) {
        this.mask.push(true);
        this.values.push(NA);
      } else {
        this.mask.push(false);
        this.values.push(value);
      }
    }
  }

  get length(): number {
    return this.values.length;
  }

  get(index: number): Maybe<T> {
    assertIndex(index, this.values.length);
    return this.values[index];
  }

  toArray(): Maybe<T>[] {
    return [...this.values];
  }

  isMissing(): boolean[] {
    return [...this.mask];
  }

  take(selector: Selector): DenseColumn<T> {
    const indices = resolveSelector(selector, this.values.length);
    return new DenseColumn(indices.map(i => this.values[i]));
  }

  /**
   * Distinct values in first-seen order (SameValueZero equality), with one
   * trailing missing marker when any element is missing.
   */
  unique(): Maybe<T>[] {
    const seen = new Set<T>();
    let sawMissing = false;
    for (const value of this.values) {
      if (value === NA) {
        sawMissing = true;
      } else {
        seen.add(value);
      }
    }
    const result: Maybe<T>[] = [...seen];
    if (sawMissing) result.push(NA);
    return result;
  }
}
