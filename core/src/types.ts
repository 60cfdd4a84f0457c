/**
 * Shared column types
 *
 * @module types
 */

import type { Logger } from './logging-types.js';
import type { RefWidth } from './refs.js';
import type { ElementTraits } from './traits.js';

/**
 * The missing marker. No element value is ever `null`, so it is the
 * out-of-band value decode returns for reference 0.
 */
export const NA = null;

export type Missing = typeof NA;

export type Maybe<T> = T | Missing;

/**
 * Selects elements of a column. A list of booleans is a mask over the whole
 * column (`null` counts as false); a list of numbers is an index list
 * (`null` entries are dropped before lookup).
 */
export type Selector = readonly (boolean | null)[] | readonly (number | null)[];

/**
 * Read surface shared by the dense and pooled column variants.
 */
export interface Column<T> {
  readonly length: number;
  get(index: number): Maybe<T>;
  toArray(): Maybe<T>[];
  isMissing(): boolean[];
  take(selector: Selector): Column<T>;
}

/**
 * Options every column constructor and builder accepts.
 */
export interface ColumnOptions {
  /** Reference width in bits (default 16) */
  refWidth?: RefWidth;
  /** Receives debug entries for pool construction and growth */
  logger?: Logger;
  /**
   * When false, values absent from a caller-fixed pool become missing
   * instead of raising ValueNotInPoolError (default true)
   */
  strictPool?: boolean;
}

/**
 * Column options with the element traits spelled out, for element types
 * the builders cannot infer.
 */
export interface TypedColumnOptions<T> extends ColumnOptions {
  traits: ElementTraits<T>;
}
