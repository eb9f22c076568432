// @flatframe/core
// Frame data model, error taxonomy and logging contracts

// =============================================================================
// Data Types, Cells and Rows
// =============================================================================

export {
  DataTypes,
  isVectorType,
  isTextType,
  dataTypesEqual,
  formatDataType,
  parseDataType,
  withCell,
  describeCell,
  assertNever,
  type ScalarKind,
  type ScalarDataType,
  type VectorDataType,
  type DataType,
  type DataTypeKind,
  type CellValue,
  type Row,
} from './types.js';

export { toVector, toText } from './coercion.js';

// =============================================================================
// Schema and Frame
// =============================================================================

export { FrameSchema, type FrameColumn } from './schema.js';
export { Frame, type Partition } from './frame.js';
export { MemoryFrameStore, type FrameStore } from './frame-store.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  FlatframeError,
  InvalidArgumentError,
  UnsupportedTypeError,
  TypeCoercionError,
  FrameNotFoundError,
  OperationCancelledError,
  CommandNotFoundError,
  CommandRegistrationError,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging (types only; implementations in @flatframe/observability)
// =============================================================================

export type {
  LogLevel,
  LogContextValue,
  LogContext,
  LogEntry,
  Logger,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from './logging-types.js';

// =============================================================================
// Constants
// =============================================================================

export {
  DEFAULT_DELIMITER,
  DEFAULT_PARTITION_SIZE,
  DEFAULT_MAX_PARALLELISM,
  MAX_RECOMMENDED_PARALLELISM,
} from './constants.js';
