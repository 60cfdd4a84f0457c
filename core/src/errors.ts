/**
 * Typed exception classes for pooled columns
 *
 * Error hierarchy:
 * - PooledError: Base error class for every error raised by this package
 *   - PoolError: Violations of the reference/pool contract
 *     - PoolCapacityError: Pool would outgrow the reference width
 *     - ReferenceOutOfRangeError: A reference points past the end of the pool
 *     - ValueNotInPoolError: Data value absent from a caller-fixed pool
 *     - ReplaceSourceNotFoundError: Replace asked to rewrite a value the pool lacks
 *   - UnsupportedElementKindError: Operation not allowed for the column's element kind
 *   - IndexOutOfRangeError: Element index outside the column
 *   - ValidationError: Malformed input (type mismatch, length mismatch, bad selector)
 *
 * None of these are caught inside the package. An operation that throws has not
 * changed the column.
 *
 * @example
 * ```typescript
 * import { PoolError, ErrorCode } from '@pooled/core';
 *
 * try {
 *   column.replace('missing-value', 'other');
 * } catch (error) {
 *   if (error instanceof PoolError && error.code === ErrorCode.REPLACE_SOURCE_NOT_FOUND) {
 *     logger.warn(error.message, { errorCode: error.code });
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',

  // Pool contract errors
  POOL_CAPACITY_EXCEEDED = 'POOL_CAPACITY_EXCEEDED',
  REFERENCE_OUT_OF_RANGE = 'REFERENCE_OUT_OF_RANGE',
  VALUE_NOT_IN_POOL = 'VALUE_NOT_IN_POOL',
  REPLACE_SOURCE_NOT_FOUND = 'REPLACE_SOURCE_NOT_FOUND',

  // Element kind errors
  UNSUPPORTED_ELEMENT_KIND = 'UNSUPPORTED_ELEMENT_KIND',

  // Access errors
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  INVALID_REF_WIDTH = 'INVALID_REF_WIDTH',
  INVALID_SELECTOR = 'INVALID_SELECTOR',
  INVALID_PERMUTATION = 'INVALID_PERMUTATION',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  const codes: readonly string[] = Object.values(ErrorCode);
  return codes.includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all pooled column errors
 *
 * Carries a machine-readable `code`, optional structured `details` and an
 * optional `suggestion` for the caller.
 */
export class PooledError extends Error {
  /**
   * Error code for programmatic identification.
   * Use ErrorCode enum values for consistency.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (operation, value, slot, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'PooledError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, PooledError);
  }

  /**
   * Format error for logging with all context.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Format error as a detailed string for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${describeValue(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

/**
 * Render a value for an error message. Pool values may be bigints or dates,
 * which JSON.stringify rejects or flattens.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'bigint') return `${value}n`;
  if (value instanceof Date) return value.toISOString();
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}

// =============================================================================
// Pool Contract Errors
// =============================================================================

/**
 * Error thrown when the reference/pool contract would be broken
 *
 * @example
 * ```typescript
 * throw PoolCapacityError.exceeded(256, 255, 8);
 * throw ReferenceOutOfRangeError.beyondPool(7, 3, 12);
 * ```
 */
export class PoolError extends PooledError {
  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'PoolError';
    captureStackTrace(this, PoolError);
  }
}

/**
 * Raised at construction (or on growth) when the pool needs more slots than
 * the reference width can address.
 */
export class PoolCapacityError extends PoolError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, ErrorCode.POOL_CAPACITY_EXCEEDED, details, suggestion);
    this.name = 'PoolCapacityError';
    captureStackTrace(this, PoolCapacityError);
  }

  static exceeded(poolSize: number, capacity: number, refWidth: number): PoolCapacityError {
    return new PoolCapacityError(
      `Pool capacity exceeded: ${poolSize} values do not fit ${refWidth}-bit references (max ${capacity})`,
      { poolSize, capacity, refWidth },
      refWidth < 32
        ? `Use a wider reference width (refWidth: ${refWidth * 2})`
        : undefined
    );
  }
}

/**
 * Raised when a reference array points beyond the end of its pool.
 */
export class ReferenceOutOfRangeError extends PoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.REFERENCE_OUT_OF_RANGE, details);
    this.name = 'ReferenceOutOfRangeError';
    captureStackTrace(this, ReferenceOutOfRangeError);
  }

  static beyondPool(ref: number, poolSize: number, index: number): ReferenceOutOfRangeError {
    return new ReferenceOutOfRangeError(
      `Reference ${ref} at index ${index} points beyond the end of the pool (size ${poolSize})`,
      { ref, poolSize, index }
    );
  }

  static invalidRef(ref: number, index: number, capacity: number): ReferenceOutOfRangeError {
    return new ReferenceOutOfRangeError(
      `Reference at index ${index} must be an integer in [0, ${capacity}], got ${ref}`,
      { ref, index, capacity }
    );
  }
}

export class ValueNotInPoolError extends PoolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      message,
      ErrorCode.VALUE_NOT_IN_POOL,
      details,
      'Add the value to the provided pool, or build without a fixed pool'
    );
    this.name = 'ValueNotInPoolError';
    captureStackTrace(this, ValueNotInPoolError);
  }

  static atIndex(value: unknown, index: number): ValueNotInPoolError {
    return new ValueNotInPoolError(
      `Value ${describeValue(value)} at index ${index} is not in the provided pool`,
      { value: describeValue(value), index }
    );
  }
}

export class ReplaceSourceNotFoundError extends PoolError {
  constructor(value: unknown) {
    super(
      `Cannot replace ${describeValue(value)}: value is not in the pool`,
      ErrorCode.REPLACE_SOURCE_NOT_FOUND,
      { operation: 'replace', value: describeValue(value) }
    );
    this.name = 'ReplaceSourceNotFoundError';
    captureStackTrace(this, ReplaceSourceNotFoundError);
  }
}

// =============================================================================
// Element Kind Errors
// =============================================================================

/**
 * Raised when an operation is attempted on a column whose element kind does
 * not support it (for example a column typed as the missing marker itself).
 */
export class UnsupportedElementKindError extends PooledError {
  constructor(kind: string, operation: string) {
    super(
      `Operation "${operation}" is not supported on columns of element kind "${kind}"`,
      ErrorCode.UNSUPPORTED_ELEMENT_KIND,
      { kind, operation },
      'Build the column with concrete element traits'
    );
    this.name = 'UnsupportedElementKindError';
    captureStackTrace(this, UnsupportedElementKindError);
  }
}

// =============================================================================
// Access Errors
// =============================================================================

export class IndexOutOfRangeError extends PooledError {
  constructor(index: number, length: number) {
    super(
      `Index ${index} is out of range for a column of length ${length}`,
      ErrorCode.INDEX_OUT_OF_RANGE,
      { index, length }
    );
    this.name = 'IndexOutOfRangeError';
    captureStackTrace(this, IndexOutOfRangeError);
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input validation fails
 *
 * @example
 * ```typescript
 * throw ValidationError.typeMismatch('string', 42);
 * throw ValidationError.lengthMismatch('mask', 3, 4);
 * ```
 */
export class ValidationError extends PooledError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  /**
   * Create a type mismatch error for a value that cannot become an element
   */
  static typeMismatch(expectedKind: string, actualValue: unknown): ValidationError {
    const actualType = actualValue === null ? 'null' : actualValue instanceof Date ? 'date' : typeof actualValue;
    return new ValidationError(
      `Type mismatch: expected ${expectedKind}, got ${actualType}`,
      ErrorCode.TYPE_MISMATCH,
      { expectedKind, actualType, actualValue: describeValue(actualValue) },
      `Convert the value to ${expectedKind} before assigning it`
    );
  }

  /**
   * Create a length mismatch error between two parallel sequences
   */
  static lengthMismatch(what: string, expected: number, actual: number): ValidationError {
    return new ValidationError(
      `Length mismatch for ${what}: expected ${expected}, got ${actual}`,
      ErrorCode.LENGTH_MISMATCH,
      { what, expected, actual }
    );
  }
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Check if an error is a PooledError with a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return error instanceof PooledError && error.code === code;
}
