// @pooled/core
// Dictionary-encoded columns: integer references into a sorted pool of distinct values

// =============================================================================
// Column Types
// =============================================================================

export {
  NA,
  type Missing,
  type Maybe,
  type Selector,
  type Column,
  type ColumnOptions,
  type TypedColumnOptions,
} from './types.js';

export { PooledColumn } from './pooled-column.js';
export { DenseColumn } from './dense-column.js';

// =============================================================================
// Element Traits
// =============================================================================

export {
  STRING_TRAITS,
  NUMBER_TRAITS,
  BOOLEAN_TRAITS,
  BIGINT_TRAITS,
  DATE_TRAITS,
  MISSING_TRAITS,
  inferTraits,
  canonicalPool,
  type ElementTraits,
  type ElementKind,
  type PoolKey,
  type PoolValue,
  type Widen,
} from './traits.js';

// =============================================================================
// Reference Arrays
// =============================================================================

export {
  isRefWidth,
  assertRefWidth,
  refCapacity,
  refWidthOf,
  allocateRefs,
  toRefArray,
  maxRef,
  assertRefsWithinPool,
  type RefWidth,
  type RefArray,
} from './refs.js';

export {
  MISSING_REF,
  UINT8_MAX,
  UINT16_MAX,
  UINT32_MAX,
  SUPPORTED_REF_WIDTHS,
  DEFAULT_REF_WIDTH,
} from './constants.js';

// =============================================================================
// Builders
// =============================================================================

export {
  encodePool,
  encodeWithFixedPool,
  type EncodedPool,
  type RawValues,
} from './pool-builder.js';

export {
  buildPool,
  buildPoolWithFixedPool,
  pooled,
  pooledMasked,
  pooledWithPool,
  pooledFromDense,
  allMissing,
  sharedPooled,
  pooledFill,
  pooledZeros,
  pooledOnes,
  pooledTrues,
  pooledFalses,
} from './factory.js';

export { buildSharedPool, type PooledSource } from './shared-pool.js';

// =============================================================================
// Replace, Levels, Ordering
// =============================================================================

export { replace } from './replace.js';
export { unique, levels, type PooledView } from './levels.js';
export {
  orderColumn,
  sortColumn,
  assertPermutation,
  type SortIndexer,
} from './ordering.js';

export { resolveSelector } from './selection.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  hasErrorCode,
  PooledError,
  PoolError,
  PoolCapacityError,
  ReferenceOutOfRangeError,
  ValueNotInPoolError,
  ReplaceSourceNotFoundError,
  UnsupportedElementKindError,
  IndexOutOfRangeError,
  ValidationError,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging Types
// =============================================================================

export {
  NOOP_LOGGER,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging-types.js';
