/**
 * Selector resolution
 *
 * Turns a boolean mask or a (missing-aware) index list into a validated list
 * of element indices.
 *
 * @module selection
 */

import { ErrorCode, IndexOutOfRangeError, ValidationError } from './errors.js';
import type { Selector } from './types.js';

/**
 * @throws {IndexOutOfRangeError}
 * @throws {ValidationError} for non-integer indices
 */
export function assertIndex(index: number, length: number): void {
  if (!Number.isInteger(index)) {
    throw new ValidationError(
      `Index must be an integer, got ${index}`,
      ErrorCode.INVALID_SELECTOR,
      { index }
    );
  }
  if (index < 0 || index >= length) {
    throw new IndexOutOfRangeError(index, length);
  }
}

function isMask(selector: Selector): selector is readonly (boolean | null)[] {
  for (let i = 0; i < selector.length; i++) {
    if (typeof selector[i] === 'boolean') return true;
  }
  return false;
}

/**
 * Resolve a selector against a column of `length` elements.
 *
 * An empty selector selects nothing. A selector mixing booleans and numbers
 * is rejected.
 *
 * @throws {ValidationError} LENGTH_MISMATCH when a mask has the wrong length
 * @throws {IndexOutOfRangeError}
 */
export function resolveSelector(selector: Selector, length: number): number[] {
  const indices: number[] = [];

  if (isMask(selector)) {
    if (selector.length !== length) {
      throw ValidationError.lengthMismatch('mask', length, selector.length);
    }
    for (let i = 0; i < selector.length; i++) {
      const entry: unknown = selector[i];
      if (entry === true) {
        indices.push(i);
      } else if (entry !== false && entry !== null) {
        throw new ValidationError(
          `Mask entries must be boolean or null, got ${typeof entry} at position ${i}`,
          ErrorCode.INVALID_SELECTOR,
          { position: i }
        );
      }
    }
    return indices;
  }

  for (const entry of selector) {
    if (entry === null) continue;
    assertIndex(entry, length);
    indices.push(entry);
  }
  return indices;
}
