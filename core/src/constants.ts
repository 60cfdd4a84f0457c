/**
 * Pooled Column Constants
 *
 * Reference widths and the capacities they imply.
 *
 * @module constants
 */

// =============================================================================
// REFERENCE WIDTHS
// =============================================================================

/** Reference value reserved for a missing element */
export const MISSING_REF = 0;

/** Largest reference a Uint8Array slot can hold */
export const UINT8_MAX = 0xff;

/** Largest reference a Uint16Array slot can hold */
export const UINT16_MAX = 0xffff;

/** Largest reference a Uint32Array slot can hold */
export const UINT32_MAX = 0xffffffff;

/** Reference widths supported by the reference array, in bits */
export const SUPPORTED_REF_WIDTHS = [8, 16, 32] as const;

/** Default reference width (capacity 65535 distinct values) */
export const DEFAULT_REF_WIDTH = 16;
