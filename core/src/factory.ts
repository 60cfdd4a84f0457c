/**
 * Column factories
 *
 * `buildPool` and `buildPoolWithFixedPool` take explicit element traits.
 * The `pooled*` helpers infer built-in traits from the values themselves and
 * widen literal types, so `pooled(['a', null])` is a `PooledColumn<string>`.
 *
 * @module factory
 */

import { PooledColumn } from './pooled-column.js';
import type { RawValues } from './pool-builder.js';
import { buildSharedPool, materialize, type PooledSource } from './shared-pool.js';
import { inferTraits, type ElementTraits, type PoolValue, type Widen } from './traits.js';
import type { Column, ColumnOptions, TypedColumnOptions } from './types.js';

// =============================================================================
// Explicit traits
// =============================================================================

export function buildPool<T>(
  values: RawValues<T>,
  mask: readonly boolean[] | undefined,
  options: TypedColumnOptions<T>
): PooledColumn<T> {
  return PooledColumn.fromMasked(values, mask, options);
}

export function buildPoolWithFixedPool<T>(
  values: RawValues<T>,
  pool: readonly T[],
  mask: readonly boolean[] | undefined,
  options: TypedColumnOptions<T>
): PooledColumn<T> {
  return PooledColumn.withPool(values, pool, options, mask);
}

// =============================================================================
// Inferred traits
// =============================================================================

/**
 * Pool primitive values, inferring their traits.
 *
 * @throws {ValidationError} TYPE_MISMATCH on mixed kinds
 */
export function pooled<T extends PoolValue>(
  values: readonly (T | null | undefined)[],
  options?: ColumnOptions
): PooledColumn<Widen<T>>;
export function pooled(
  values: readonly (PoolValue | null | undefined)[],
  options: ColumnOptions = {}
): PooledColumn<PoolValue> {
  return PooledColumn.from(values, { ...options, traits: inferTraits(values) });
}

export function pooledMasked<T extends PoolValue>(
  values: readonly (T | null | undefined)[],
  mask: readonly boolean[],
  options?: ColumnOptions
): PooledColumn<Widen<T>>;
export function pooledMasked(
  values: readonly (PoolValue | null | undefined)[],
  mask: readonly boolean[],
  options: ColumnOptions = {}
): PooledColumn<PoolValue> {
  return PooledColumn.fromMasked(values, mask, { ...options, traits: inferTraits(values) });
}

/**
 * Pool values against a fixed pool. Traits are inferred from the pool and
 * the values together.
 */
export function pooledWithPool<T extends PoolValue>(
  values: readonly (T | null | undefined)[],
  pool: readonly T[],
  options?: ColumnOptions
): PooledColumn<Widen<T>>;
export function pooledWithPool(
  values: readonly (PoolValue | null | undefined)[],
  pool: readonly PoolValue[],
  options: ColumnOptions = {}
): PooledColumn<PoolValue> {
  const traits = inferTraits([...pool, ...values]);
  return PooledColumn.withPool(values, pool, { ...options, traits });
}

export function pooledFromDense<T extends PoolValue>(
  dense: Column<T>,
  options?: ColumnOptions
): PooledColumn<Widen<T>>;
export function pooledFromDense(dense: Column<PoolValue>, options: ColumnOptions = {}): PooledColumn<PoolValue> {
  const values = dense.toArray();
  return PooledColumn.fromMasked(values, dense.isMissing(), { ...options, traits: inferTraits(values) });
}

/**
 * `length` missing elements over an empty pool. Pass traits for a typed
 * column that `set` can fill later.
 */
export function allMissing<T>(length: number, options: TypedColumnOptions<T>): PooledColumn<T>;
export function allMissing(length: number, options?: ColumnOptions): PooledColumn<never>;
export function allMissing<T>(
  length: number,
  options: ColumnOptions & { traits?: ElementTraits<T> } = {}
): PooledColumn<T> | PooledColumn<never> {
  const { traits } = options;
  return traits === undefined
    ? PooledColumn.allMissing(length, options)
    : PooledColumn.allMissing(length, { ...options, traits });
}

// =============================================================================
// Filled columns
// =============================================================================

/**
 * `length` copies of `value`, with traits inferred from it.
 *
 * @example
 * ```typescript
 * pooledFill('n/a', 3).toArray(); // ['n/a', 'n/a', 'n/a']
 * pooledFill(0n, 2).pool;         // [0n]
 * ```
 */
export function pooledFill<T extends PoolValue>(
  value: T,
  length: number,
  options?: ColumnOptions
): PooledColumn<Widen<T>>;
export function pooledFill(value: PoolValue, length: number, options: ColumnOptions = {}): PooledColumn<PoolValue> {
  return PooledColumn.filled(value, length, { ...options, traits: inferTraits([value]) });
}

export function pooledZeros(length: number, options?: ColumnOptions): PooledColumn<number> {
  return pooledFill(0, length, options);
}

export function pooledOnes(length: number, options?: ColumnOptions): PooledColumn<number> {
  return pooledFill(1, length, options);
}

export function pooledTrues(length: number, options?: ColumnOptions): PooledColumn<boolean> {
  return pooledFill(true, length, options);
}

export function pooledFalses(length: number, options?: ColumnOptions): PooledColumn<boolean> {
  return pooledFill(false, length, options);
}

/**
 * Pool two sources over one shared pool, inferring traits from both.
 */
export function sharedPooled<T extends PoolValue>(
  left: PooledSource<T>,
  right: PooledSource<T>,
  options?: ColumnOptions
): readonly [PooledColumn<Widen<T>>, PooledColumn<Widen<T>>];
export function sharedPooled(
  left: PooledSource<PoolValue>,
  right: PooledSource<PoolValue>,
  options: ColumnOptions = {}
): readonly [PooledColumn<PoolValue>, PooledColumn<PoolValue>] {
  const leftValues = materialize(left);
  const rightValues = materialize(right);
  const traits = inferTraits([...leftValues, ...rightValues]);
  return buildSharedPool(leftValues, rightValues, { ...options, traits });
}
