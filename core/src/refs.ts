/**
 * Reference arrays
 *
 * A reference array holds one unsigned integer per logical element: 0 for
 * missing, r > 0 for pool slot r (1-based). The typed array's width bounds
 * how many pool slots can be addressed.
 *
 * @module refs
 */

import {
  DEFAULT_REF_WIDTH,
  SUPPORTED_REF_WIDTHS,
  UINT16_MAX,
  UINT32_MAX,
  UINT8_MAX,
} from './constants.js';
import { ErrorCode, ReferenceOutOfRangeError, ValidationError } from './errors.js';

export type RefWidth = (typeof SUPPORTED_REF_WIDTHS)[number];

export type RefArray = Uint8Array | Uint16Array | Uint32Array;

export function isRefWidth(value: unknown): value is RefWidth {
  return SUPPORTED_REF_WIDTHS.some(width => width === value);
}

/**
 * @throws {ValidationError} INVALID_REF_WIDTH
 */
export function assertRefWidth(value: unknown): asserts value is RefWidth {
  if (!isRefWidth(value)) {
    throw new ValidationError(
      `Invalid reference width: ${String(value)}`,
      ErrorCode.INVALID_REF_WIDTH,
      { refWidth: String(value), supported: [...SUPPORTED_REF_WIDTHS] },
      `Use one of ${SUPPORTED_REF_WIDTHS.join(', ')}`
    );
  }
}

/**
 * Largest pool a reference width can address.
 */
export function refCapacity(width: RefWidth): number {
  switch (width) {
    case 8:
      return UINT8_MAX;
    case 16:
      return UINT16_MAX;
    case 32:
      return UINT32_MAX;
  }
}

export function refWidthOf(refs: RefArray): RefWidth {
  if (refs instanceof Uint8Array) return 8;
  if (refs instanceof Uint16Array) return 16;
  return 32;
}

/**
 * Allocate a zero-filled (all missing) reference array.
 */
export function allocateRefs(length: number, width: RefWidth = DEFAULT_REF_WIDTH): RefArray {
  switch (width) {
    case 8:
      return new Uint8Array(length);
    case 16:
      return new Uint16Array(length);
    case 32:
      return new Uint32Array(length);
  }
}

/**
 * Copy plain numbers into a reference array of the given width.
 *
 * @throws {ReferenceOutOfRangeError} for negative, fractional or too-wide entries
 */
export function toRefArray(refs: ArrayLike<number>, width: RefWidth): RefArray {
  const capacity = refCapacity(width);
  const result = allocateRefs(refs.length, width);
  for (let i = 0; i < refs.length; i++) {
    const ref = refs[i];
    if (!Number.isInteger(ref) || ref < 0 || ref > capacity) {
      throw ReferenceOutOfRangeError.invalidRef(ref, i, capacity);
    }
    result[i] = ref;
  }
  return result;
}

/**
 * Largest reference in the array, 0 when empty or all missing.
 */
export function maxRef(refs: ArrayLike<number>): number {
  let max = 0;
  for (let i = 0; i < refs.length; i++) {
    if (refs[i] > max) max = refs[i];
  }
  return max;
}

/**
 * Check `max(refs) <= poolSize`, naming the first offending index.
 *
 * @throws {ReferenceOutOfRangeError}
 */
export function assertRefsWithinPool(refs: ArrayLike<number>, poolSize: number): void {
  if (maxRef(refs) <= poolSize) return;
  for (let i = 0; i < refs.length; i++) {
    if (refs[i] > poolSize) {
      throw ReferenceOutOfRangeError.beyondPool(refs[i], poolSize, i);
    }
  }
}

/**
 * New reference array of the same width holding `refs[i]` for each index.
 * Indices must already be validated.
 */
export function gatherRefs(refs: RefArray, indices: readonly number[]): RefArray {
  const result = allocateRefs(indices.length, refWidthOf(refs));
  for (let i = 0; i < indices.length; i++) {
    result[i] = refs[indices[i]];
  }
  return result;
}

export function copyRefs(refs: RefArray): RefArray {
  return refs.slice();
}
