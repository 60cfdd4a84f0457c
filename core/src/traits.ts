/**
 * Element traits
 *
 * A pooled column needs four capabilities from its element type: a hash key
 * for deduplication, a total order for the canonical pool sort, equality
 * (equal keys), and conversion from an arbitrary assigned value. They are
 * bundled as an `ElementTraits<T>` value rather than dispatched on the
 * runtime type, so custom element types plug in the same way as primitives.
 *
 * @module traits
 */

import { ValidationError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Hashable key a pool value is deduplicated by. Map keys compare with
 * SameValueZero, so NaN matches NaN and -0 matches 0.
 */
export type PoolKey = string | number | bigint | boolean;

export type ElementKind =
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'date'
  | 'missing'
  | 'custom';

/**
 * Capabilities a pooled column requires of its element type.
 */
export interface ElementTraits<T> {
  readonly kind: ElementKind;
  /** Equal values must produce equal keys */
  key(value: T): PoolKey;
  /** Total order; negative, zero or positive like Array#sort comparators */
  compare(a: T, b: T): number;
  /** Convert an assigned value into T, throwing ValidationError when impossible */
  convert(value: unknown): T;
  /**
   * Detach a value from the caller before it enters a pool. Element types
   * whose values can be mutated after the fact implement it.
   */
  copy?(value: T): T;
}

/** Element types with built-in traits */
export type PoolValue = string | number | boolean | bigint | Date;

/**
 * Widen literal element types to the primitive they belong to, so that
 * `pooled(['a', 'b'])` yields a `PooledColumn<string>`.
 */
export type Widen<T> = T extends string
  ? string
  : T extends number
    ? number
    : T extends boolean
      ? boolean
      : T extends bigint
        ? bigint
        : T extends Date
          ? Date
          : never;

// =============================================================================
// Built-in Traits
// =============================================================================

function compareOrdered<V extends string | number | bigint>(a: V, b: V): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Strings compare by UTF-16 code units, the order `Array#sort` uses by default.
 */
export const STRING_TRAITS: ElementTraits<string> = {
  kind: 'string',
  key(value) {
    return value;
  },
  compare(a, b) {
    return compareOrdered(a, b);
  },
  convert(value) {
    if (typeof value === 'string') return value;
    throw ValidationError.typeMismatch('string', value);
  },
};

/**
 * Numbers: NaN sorts after every other number, -0 and 0 are the same value.
 */
export const NUMBER_TRAITS: ElementTraits<number> = {
  kind: 'number',
  key(value) {
    return value;
  },
  compare(a, b) {
    const aNaN = Number.isNaN(a);
    const bNaN = Number.isNaN(b);
    if (aNaN || bNaN) {
      return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
    }
    return compareOrdered(a, b);
  },
  convert(value) {
    if (typeof value === 'number') return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'bigint' && value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(value);
    }
    throw ValidationError.typeMismatch('number', value);
  },
};

/** false sorts before true */
export const BOOLEAN_TRAITS: ElementTraits<boolean> = {
  kind: 'boolean',
  key(value) {
    return value;
  },
  compare(a, b) {
    return Number(a) - Number(b);
  },
  convert(value) {
    if (typeof value === 'boolean') return value;
    if (value === 0 || value === 1) return value === 1;
    throw ValidationError.typeMismatch('boolean', value);
  },
};

export const BIGINT_TRAITS: ElementTraits<bigint> = {
  kind: 'bigint',
  key(value) {
    return value;
  },
  compare(a, b) {
    return compareOrdered(a, b);
  },
  convert(value) {
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
    throw ValidationError.typeMismatch('bigint', value);
  },
};

/**
 * Dates are keyed and ordered by epoch milliseconds. Invalid dates are rejected.
 * Pools hold their own Date instances, so `setTime` on a caller's date never
 * reaches a column.
 */
export const DATE_TRAITS: ElementTraits<Date> = {
  kind: 'date',
  key(value) {
    return value.getTime();
  },
  compare(a, b) {
    return a.getTime() - b.getTime();
  },
  convert(value) {
    const date = value instanceof Date || typeof value === 'string' || typeof value === 'number'
      ? new Date(value instanceof Date ? value.getTime() : value)
      : undefined;
    if (date === undefined || Number.isNaN(date.getTime())) {
      throw ValidationError.typeMismatch('date', value);
    }
    return date;
  },
  copy(value) {
    return new Date(value.getTime());
  },
};

/**
 * Traits of a column typed as the missing marker itself. Such a column can
 * only ever hold missing references, so nothing converts into it.
 */
export const MISSING_TRAITS: ElementTraits<never> = {
  kind: 'missing',
  key() {
    throw ValidationError.typeMismatch('missing', undefined);
  },
  compare() {
    return 0;
  },
  convert(value) {
    throw ValidationError.typeMismatch('missing', value);
  },
};

// =============================================================================
// Inference
// =============================================================================

function kindOf(value: unknown): ElementKind | undefined {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'bigint':
      return 'bigint';
    default:
      return value instanceof Date ? 'date' : undefined;
  }
}

function traitsForKind(kind: ElementKind): ElementTraits<PoolValue> {
  switch (kind) {
    case 'string':
      return STRING_TRAITS;
    case 'number':
      return NUMBER_TRAITS;
    case 'boolean':
      return BOOLEAN_TRAITS;
    case 'bigint':
      return BIGINT_TRAITS;
    case 'date':
      return DATE_TRAITS;
    default:
      return MISSING_TRAITS;
  }
}

/**
 * Pick built-in traits for a sequence of primitive values.
 *
 * Missing values (`null` or `undefined`) are skipped. A sequence with no
 * concrete value gets the `missing` kind. Mixed kinds are rejected.
 *
 * @throws {ValidationError} TYPE_MISMATCH on mixed or unsupported values
 */
export function inferTraits(values: Iterable<unknown>): ElementTraits<PoolValue> {
  let kind: ElementKind | undefined;
  for (const value of values) {
    if (value === null || value === undefined) continue;
    const valueKind = kindOf(value);
    if (valueKind === undefined) {
      throw ValidationError.typeMismatch(kind ?? 'string, number, boolean, bigint or date', value);
    }
    if (kind === undefined) {
      kind = valueKind;
    } else if (kind !== valueKind) {
      throw ValidationError.typeMismatch(kind, value);
    }
  }
  return traitsForKind(kind ?? 'missing');
}

/**
 * Sort and deduplicate `values` by the traits' key and order. This is the
 * canonical pool order shared by every builder.
 */
export function canonicalPool<T>(values: Iterable<T>, traits: ElementTraits<T>): T[] {
  const seen = new Map<PoolKey, T>();
  for (const value of values) {
    const key = traits.key(value);
    if (!seen.has(key)) seen.set(key, value);
  }
  return [...seen.values()].sort((a, b) => traits.compare(a, b));
}
