/**
 * Dual pool builder
 *
 * Encodes two sequences against one canonical pool, so equal values carry
 * equal references in both outputs and a join can compare references
 * directly. Missing positions stay out of the pool and encode as 0 on both
 * sides. Each output owns its own copy of the pool.
 *
 * @module shared-pool
 */

import { NOOP_LOGGER } from './logging-types.js';
import {
  assertPoolFits,
  encodeRefs,
  indexPool,
  presentValues,
  resolveBuildWidth,
  type RawValues,
} from './pool-builder.js';
import { PooledColumn } from './pooled-column.js';
import { canonicalPool } from './traits.js';
import type { Column, TypedColumnOptions } from './types.js';

/** A column or a raw value sequence */
export type PooledSource<T> = Column<T> | RawValues<T>;

function isColumn<T>(source: PooledSource<T>): source is Column<T> {
  return 'toArray' in source;
}

/**
 * Decoded values of a source, with missing positions as `null`.
 */
export function materialize<T>(source: PooledSource<T>): RawValues<T> {
  return isColumn(source) ? source.toArray() : source;
}

/**
 * @throws {PoolCapacityError} when the union of both sides outgrows the width
 */
export function buildSharedPool<T>(
  left: PooledSource<T>,
  right: PooledSource<T>,
  options: TypedColumnOptions<T>
): readonly [PooledColumn<T>, PooledColumn<T>] {
  const { traits } = options;
  const width = resolveBuildWidth(options.refWidth);
  const leftValues = materialize(left);
  const rightValues = materialize(right);

  const pool = canonicalPool([...presentValues(leftValues), ...presentValues(rightValues)], traits);
  assertPoolFits(pool.length, width);

  const slots = indexPool(pool, traits);
  const leftRefs = encodeRefs(leftValues, undefined, slots, traits, width);
  const rightRefs = encodeRefs(rightValues, undefined, slots, traits, width);

  (options.logger ?? NOOP_LOGGER).debug('Built shared pool', {
    operation: 'buildSharedPool',
    rows: leftValues.length + rightValues.length,
    poolSize: pool.length,
    refWidth: width,
  });

  return [new PooledColumn(leftRefs, pool, options), new PooledColumn(rightRefs, pool, options)];
}
