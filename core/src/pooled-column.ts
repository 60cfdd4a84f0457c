/**
 * PooledColumn - dictionary-encoded column
 *
 * Stores each element as an unsigned integer reference into a pool of
 * distinct values: 0 is missing, r > 0 is pool slot r. Downstream join and
 * group code compares `refs` directly; `get`/`toArray` decode for display.
 *
 * @example
 * ```typescript
 * const column = pooled(['a', 'b', 'a', null]);
 * column.pool;           // ['a', 'b']
 * [...column.refs];      // [1, 2, 1, 0]
 * column.replace('a', 'b');
 * column.toArray();      // ['b', 'b', 'b', null]
 * ```
 *
 * @module pooled-column
 */

import { DEFAULT_REF_WIDTH, MISSING_REF } from './constants.js';
import { DenseColumn } from './dense-column.js';
import {
  ErrorCode,
  PoolCapacityError,
  UnsupportedElementKindError,
  ValidationError,
} from './errors.js';
import { unique } from './levels.js';
import { NOOP_LOGGER } from './logging-types.js';
import { encodePool, encodeWithFixedPool, type EncodedPool, type RawValues } from './pool-builder.js';
import { PoolState } from './pool-state.js';
import {
  allocateRefs,
  assertRefWidth,
  assertRefsWithinPool,
  copyRefs,
  gatherRefs,
  refCapacity,
  refWidthOf,
  toRefArray,
  type RefArray,
  type RefWidth,
} from './refs.js';
import { replaceInPool } from './replace.js';
import { assertIndex, resolveSelector } from './selection.js';
import { MISSING_TRAITS, type ElementKind, type ElementTraits } from './traits.js';
import {
  NA,
  type Column,
  type ColumnOptions,
  type Maybe,
  type Selector,
  type TypedColumnOptions,
} from './types.js';

function isRefArray(refs: RefArray | readonly number[]): refs is RefArray {
  return refs instanceof Uint8Array || refs instanceof Uint16Array || refs instanceof Uint32Array;
}

function resolveWidth(refs: RefArray | readonly number[], requested: RefWidth | undefined): RefWidth {
  if (requested !== undefined) assertRefWidth(requested);
  if (!isRefArray(refs)) return requested ?? DEFAULT_REF_WIDTH;

  const actual = refWidthOf(refs);
  if (requested !== undefined && requested !== actual) {
    throw new ValidationError(
      `Reference array is ${actual}-bit but refWidth ${requested} was requested`,
      ErrorCode.INVALID_REF_WIDTH,
      { requested, actual }
    );
  }
  return actual;
}

export class PooledColumn<T> implements Column<T>, Iterable<Maybe<T>> {
  private readonly state: PoolState<T>;

  /**
   * Wrap an existing reference array and pool.
   *
   * A typed reference array fixes the width; a plain number array is
   * converted to one of `options.refWidth` bits. Both the references and the
   * pool are copied, so later writes to the caller's arrays never reach the
   * column.
   *
   * @throws {PoolCapacityError} when the pool outgrows the width
   * @throws {ReferenceOutOfRangeError} when a reference points past the pool
   */
  constructor(refs: RefArray | readonly number[], pool: readonly T[], options: TypedColumnOptions<T>) {
    const width = resolveWidth(refs, options.refWidth);
    const capacity = refCapacity(width);
    if (pool.length > capacity) {
      throw PoolCapacityError.exceeded(pool.length, capacity, width);
    }

    const refArray = isRefArray(refs) ? copyRefs(refs) : toRefArray(refs, width);
    assertRefsWithinPool(refArray, pool.length);

    this.state = new PoolState(refArray, pool, options.traits, options.logger ?? NOOP_LOGGER);
  }

  // ===========================================================================
  // Factories
  // ===========================================================================

  /** Pool `values`; `null` and `undefined` entries are missing */
  static from<T>(values: RawValues<T>, options: TypedColumnOptions<T>): PooledColumn<T> {
    return PooledColumn.fromMasked(values, undefined, options);
  }

  /**
   * Pool `values`, treating positions where `mask` is true as missing.
   *
   * @throws {ValidationError} LENGTH_MISMATCH when the mask length differs
   */
  static fromMasked<T>(
    values: RawValues<T>,
    mask: readonly boolean[] | undefined,
    options: TypedColumnOptions<T>
  ): PooledColumn<T> {
    return PooledColumn.wrap(encodePool(values, mask, options), options);
  }

  /**
   * Pool `values` against a caller-fixed pool, which is deduplicated and sorted.
   *
   * @throws {ValueNotInPoolError} when a value is absent from `pool` and `strictPool` is on
   */
  static withPool<T>(
    values: RawValues<T>,
    pool: readonly T[],
    options: TypedColumnOptions<T>,
    mask?: readonly boolean[]
  ): PooledColumn<T> {
    return PooledColumn.wrap(encodeWithFixedPool(values, pool, mask, options), options);
  }

  /** Pool the decoded values of another column */
  static fromDense<T>(dense: Column<T>, options: TypedColumnOptions<T>): PooledColumn<T> {
    return PooledColumn.fromMasked(dense.toArray(), dense.isMissing(), options);
  }

  /**
   * `length` missing elements over an empty pool. With traits the column is
   * typed and can be filled through `set`; without them it has the missing
   * kind and accepts nothing but missing values.
   */
  static allMissing<T>(length: number, options: TypedColumnOptions<T>): PooledColumn<T>;
  static allMissing(length: number, options?: ColumnOptions): PooledColumn<never>;
  static allMissing<T>(
    length: number,
    options: ColumnOptions & { traits?: ElementTraits<T> } = {}
  ): PooledColumn<T> | PooledColumn<never> {
    const width = options.refWidth ?? DEFAULT_REF_WIDTH;
    assertRefWidth(width);
    const refs = allocateRefs(length, width);
    const { traits } = options;
    if (traits === undefined) {
      return new PooledColumn<never>(refs, [], { ...options, traits: MISSING_TRAITS });
    }
    return new PooledColumn(refs, [], { ...options, traits });
  }

  /**
   * `length` copies of one value: a single-slot pool and every reference 1.
   *
   * @throws {ValidationError} TYPE_MISMATCH when `value` does not convert
   */
  static filled<T>(value: T, length: number, options: TypedColumnOptions<T>): PooledColumn<T> {
    const width = options.refWidth ?? DEFAULT_REF_WIDTH;
    assertRefWidth(width);
    const refs = allocateRefs(length, width);
    refs.fill(1);
    return new PooledColumn(refs, [options.traits.convert(value)], options);
  }

  private static wrap<T>(encoded: EncodedPool<T>, options: TypedColumnOptions<T>): PooledColumn<T> {
    return new PooledColumn(encoded.refs, encoded.pool, options);
  }

  // ===========================================================================
  // Shape
  // ===========================================================================

  get length(): number {
    return this.state.refs.length;
  }

  get refWidth(): RefWidth {
    return this.state.width;
  }

  /** Largest pool this column's reference width can address */
  get capacity(): number {
    return this.state.capacity;
  }

  get traits(): ElementTraits<T> {
    return this.state.traits;
  }

  get kind(): ElementKind {
    return this.state.traits.kind;
  }

  /**
   * Live read-only view of the reference array, for integer-only
   * comparison in join and group code.
   */
  get refs(): ArrayLike<number> {
    return this.state.refs;
  }

  /** Live read-only view of the pool, in slot order */
  get pool(): readonly T[] {
    return this.state.pool;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Decode element `index`: the missing marker for reference 0, otherwise
   * the pool value it points at.
   */
  get(index: number): Maybe<T> {
    assertIndex(index, this.length);
    return this.decodeRef(this.state.refs[index]);
  }

  toArray(): Maybe<T>[] {
    const result: Maybe<T>[] = new Array(this.length);
    for (let i = 0; i < this.length; i++) {
      result[i] = this.decodeRef(this.state.refs[i]);
    }
    return result;
  }

  toDense(): DenseColumn<T> {
    return new DenseColumn(this.toArray());
  }

  *[Symbol.iterator](): Iterator<Maybe<T>> {
    for (let i = 0; i < this.length; i++) {
      yield this.decodeRef(this.state.refs[i]);
    }
  }

  isMissing(): boolean[] {
    return Array.from(this.state.refs, ref => ref === MISSING_REF);
  }

  hasMissing(): boolean {
    return this.state.hasMissing();
  }

  /**
   * Select elements into a new column with the same width and a copy of the
   * whole pool. The pool is not pruned to the values still referenced.
   */
  take(selector: Selector): PooledColumn<T> {
    const indices = resolveSelector(selector, this.length);
    return this.derive(gatherRefs(this.state.refs, indices));
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Assign one element. `null` or `undefined` makes it missing; any other
   * value is converted through the element traits, then either found in the
   * pool or appended as a new last slot.
   *
   * @returns the stored value (after conversion)
   * @throws {ValidationError} TYPE_MISMATCH when the value cannot be converted
   * @throws {PoolCapacityError} when a new value does not fit the width
   */
  set(index: number, value: unknown): Maybe<T> {
    assertIndex(index, this.length);

    if (value === null || value === undefined) {
      this.state.refs[index] = MISSING_REF;
      return NA;
    }

    const converted = this.state.traits.convert(value);
    const existing = this.state.slotOf(converted);
    this.state.refs[index] = existing !== MISSING_REF ? existing : this.state.append(converted);
    return converted;
  }

  /**
   * Make every selected element missing. The pool is left untouched.
   *
   * @throws {UnsupportedElementKindError} on a column of the missing kind
   */
  setMissing(selector: Selector): void {
    if (this.kind === 'missing') {
      throw new UnsupportedElementKindError(this.kind, 'setMissing');
    }
    for (const index of resolveSelector(selector, this.length)) {
      this.state.refs[index] = MISSING_REF;
    }
  }

  /**
   * Replace every occurrence of `from` with `to` in place.
   * See the replace module for the full transition table.
   */
  replace(from: Maybe<T>, to: Maybe<T>): Maybe<T> {
    return replaceInPool(this.state, from, to);
  }

  // ===========================================================================
  // Copies
  // ===========================================================================

  /** Deep copy: independent reference array and pool */
  copy(): PooledColumn<T> {
    return this.derive(this.state.refs);
  }

  /**
   * A column of `length` missing elements over a copy of this pool.
   */
  similar(length: number = this.length): PooledColumn<T> {
    return this.derive(allocateRefs(length, this.refWidth));
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  /** Pool slot holding `value`, or 0 */
  indexOf(value: T): number {
    return this.state.slotOf(value);
  }

  /**
   * Pool values to their slots. Keys are the pool's own values, so object
   * elements such as dates only match by identity here; `indexOf` matches
   * an equal value through the traits key.
   */
  levelToIndex(): Map<T, number> {
    const result = new Map<T, number>();
    this.state.pool.forEach((value, i) => {
      if (!result.has(value)) result.set(value, i + 1);
    });
    return result;
  }

  indexToLevel(): Map<number, T> {
    const result = new Map<number, T>();
    this.state.pool.forEach((value, i) => result.set(i + 1, value));
    return result;
  }

  /** The pool, plus a trailing missing marker when any element is missing */
  unique(): Maybe<T>[] {
    return unique(this);
  }

  levels(): Maybe<T>[] {
    return unique(this);
  }

  private decodeRef(ref: number): Maybe<T> {
    return ref === MISSING_REF ? NA : this.state.pool[ref - 1];
  }

  private derive(refs: RefArray): PooledColumn<T> {
    return new PooledColumn(refs, this.state.pool, {
      traits: this.state.traits,
      logger: this.state.logger,
    });
  }
}
