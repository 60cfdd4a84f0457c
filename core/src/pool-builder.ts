/**
 * Pool builder
 *
 * Deduplicates a raw value sequence into a canonically ordered pool and the
 * matching reference array:
 *
 * 1. collect the distinct values at non-missing positions
 * 2. sort them ascending (the canonical pool)
 * 3. give each pool value its 1-based rank
 * 4. write 0 at missing positions and the rank everywhere else
 *
 * The pool order depends only on the set of values, never on first-seen order.
 *
 * @module pool-builder
 */

import { DEFAULT_REF_WIDTH, MISSING_REF } from './constants.js';
import { PoolCapacityError, ValidationError, ValueNotInPoolError } from './errors.js';
import { NOOP_LOGGER } from './logging-types.js';
import { allocateRefs, assertRefWidth, refCapacity, type RefArray, type RefWidth } from './refs.js';
import { canonicalPool, type ElementTraits, type PoolKey } from './traits.js';
import type { TypedColumnOptions } from './types.js';

// =============================================================================
// Shared Helpers
// =============================================================================

export type RawValues<T> = readonly (T | null | undefined)[];

/**
 * A reference array and the pool it indexes, ready to wrap in a column.
 */
export interface EncodedPool<T> {
  refs: RefArray;
  pool: T[];
}

/**
 * Concrete values of `values`, skipping null, undefined and masked positions.
 */
export function presentValues<T>(values: RawValues<T>, mask?: readonly boolean[]): T[] {
  const result: T[] = [];
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value !== null && value !== undefined && mask?.[i] !== true) {
      result.push(value);
    }
  }
  return result;
}

/**
 * Map each pool value's key to its 1-based slot.
 */
export function indexPool<T>(pool: readonly T[], traits: ElementTraits<T>): Map<PoolKey, number> {
  const slots = new Map<PoolKey, number>();
  pool.forEach((value, i) => slots.set(traits.key(value), i + 1));
  return slots;
}

export function resolveBuildWidth(requested: RefWidth | undefined): RefWidth {
  const width = requested ?? DEFAULT_REF_WIDTH;
  assertRefWidth(width);
  return width;
}

export function assertPoolFits(poolSize: number, width: RefWidth): void {
  const capacity = refCapacity(width);
  if (poolSize > capacity) {
    throw PoolCapacityError.exceeded(poolSize, capacity, width);
  }
}

function assertMaskLength(values: RawValues<unknown>, mask: readonly boolean[] | undefined): void {
  if (mask !== undefined && mask.length !== values.length) {
    throw ValidationError.lengthMismatch('mask', values.length, mask.length);
  }
}

/**
 * Encode `values` against an index of pool slots. Values missing from the
 * index are handed to `onUnknown`, which returns the reference to store.
 */
export function encodeRefs<T>(
  values: RawValues<T>,
  mask: readonly boolean[] | undefined,
  slots: Map<PoolKey, number>,
  traits: ElementTraits<T>,
  width: RefWidth,
  onUnknown: (value: T, index: number) => number = () => MISSING_REF
): RefArray {
  const refs = allocateRefs(values.length, width);
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value === null || value === undefined || mask?.[i] === true) continue;
    refs[i] = slots.get(traits.key(value)) ?? onUnknown(value, i);
  }
  return refs;
}

// =============================================================================
// Builders
// =============================================================================

/**
 * Encode raw values and an optional missingness mask against their own
 * canonical pool.
 * `null` and `undefined` values are missing whatever the mask says.
 *
 * @throws {ValidationError} LENGTH_MISMATCH when the mask length differs
 * @throws {PoolCapacityError} when there are more distinct values than the width addresses
 */
export function encodePool<T>(
  values: RawValues<T>,
  mask: readonly boolean[] | undefined,
  options: TypedColumnOptions<T>
): EncodedPool<T> {
  assertMaskLength(values, mask);
  const width = resolveBuildWidth(options.refWidth);
  const { traits } = options;

  const pool = canonicalPool(presentValues(values, mask), traits);
  assertPoolFits(pool.length, width);

  const refs = encodeRefs(values, mask, indexPool(pool, traits), traits, width);

  (options.logger ?? NOOP_LOGGER).debug('Built pool', {
    operation: 'buildPool',
    rows: values.length,
    poolSize: pool.length,
    refWidth: width,
  });

  return { refs, pool };
}

/**
 * Encode raw values against a caller-fixed pool. The pool actually used is
 * the caller's pool deduplicated and sorted, not its original order.
 *
 * With `strictPool: false`, values absent from the pool become missing and
 * one warning reports how many there were.
 *
 * @throws {PoolCapacityError} when the caller's pool is longer than the width addresses
 * @throws {ValueNotInPoolError} when a value is absent from the pool (strict mode)
 */
export function encodeWithFixedPool<T>(
  values: RawValues<T>,
  pool: readonly T[],
  mask: readonly boolean[] | undefined,
  options: TypedColumnOptions<T>
): EncodedPool<T> {
  assertMaskLength(values, mask);
  const width = resolveBuildWidth(options.refWidth);
  assertPoolFits(pool.length, width);

  const { traits } = options;
  const logger = options.logger ?? NOOP_LOGGER;
  const strict = options.strictPool ?? true;

  const canonical = canonicalPool(pool, traits);
  let unknown = 0;
  const refs = encodeRefs(values, mask, indexPool(canonical, traits), traits, width, (value, index) => {
    if (strict) {
      throw ValueNotInPoolError.atIndex(value, index);
    }
    unknown++;
    return MISSING_REF;
  });

  if (unknown > 0) {
    logger.warn('Values not in the provided pool were set to missing', {
      operation: 'buildPoolWithFixedPool',
      rows: unknown,
      poolSize: canonical.length,
    });
  }
  logger.debug('Built pool', {
    operation: 'buildPoolWithFixedPool',
    rows: values.length,
    poolSize: canonical.length,
    refWidth: width,
  });

  return { refs, pool: canonical };
}
