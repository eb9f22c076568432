/**
 * Typed exception classes for flatframe
 *
 * Error hierarchy:
 * - FlatframeError: Base error class for all flatframe errors
 *   - InvalidArgumentError: Malformed command arguments or schema lookups,
 *     raised before any row is processed
 *   - UnsupportedTypeError: A target column whose type cannot be flattened
 *   - TypeCoercionError: A cell whose runtime value disagrees with its
 *     declared column type, raised while the offending row is processed
 *   - FrameNotFoundError: A frame id the store does not know
 *   - OperationCancelledError: A transform aborted through its signal
 *   - CommandNotFoundError, CommandRegistrationError: Command registry failures
 *
 * Use error codes for fine-grained programmatic error handling.
 *
 * @example
 * ```typescript
 * import { InvalidArgumentError, UnsupportedTypeError, ErrorCode } from '@flatframe/core';
 *
 * try {
 *   await registry.run('frame/flatten_columns', args, invocation);
 * } catch (error) {
 *   if (error instanceof InvalidArgumentError && error.code === ErrorCode.DELIMITER_COUNT_MISMATCH) {
 *     logger.warn(error.message, { errorCode: error.code });
 *   } else if (error instanceof UnsupportedTypeError) {
 *     logger.error('Cannot flatten column', error);
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
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Argument errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  DELIMITER_COUNT_MISMATCH = 'DELIMITER_COUNT_MISMATCH',
  INVALID_DELIMITER = 'INVALID_DELIMITER',
  COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
  DUPLICATE_COLUMN = 'DUPLICATE_COLUMN',
  MIXED_COLUMN_TYPES = 'MIXED_COLUMN_TYPES',
  MULTIPLE_VECTOR_COLUMNS = 'MULTIPLE_VECTOR_COLUMNS',
  ROW_ARITY_MISMATCH = 'ROW_ARITY_MISMATCH',
  INVALID_DATA_TYPE = 'INVALID_DATA_TYPE',

  // Type errors
  UNSUPPORTED_COLUMN_TYPE = 'UNSUPPORTED_COLUMN_TYPE',
  TYPE_COERCION_ERROR = 'TYPE_COERCION_ERROR',
  VECTOR_LENGTH_MISMATCH = 'VECTOR_LENGTH_MISMATCH',

  // Store errors
  FRAME_NOT_FOUND = 'FRAME_NOT_FOUND',

  // Command errors
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  COMMAND_REGISTRATION_ERROR = 'COMMAND_REGISTRATION_ERROR',

  // Execution errors
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all flatframe errors
 *
 * All flatframe errors extend this class, allowing for:
 * - Catching every flatframe error with a single catch block
 * - Programmatic error identification via the `code` property
 * - Optional details object for structured debugging info
 * - Suggestions for common error conditions
 */
export class FlatframeError extends Error {
  /**
   * Error code for programmatic identification.
   */
  public readonly code: string;

  /**
   * Structured details for debugging (column, row, expected values, etc.)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Suggestion for resolving the error (when applicable)
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
    this.name = 'FlatframeError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, FlatframeError);
  }

  /**
   * Structured object suitable for JSON logging.
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
   * Multi-line description for debugging.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Argument Errors
// =============================================================================

/**
 * Error thrown when a command's arguments cannot be applied to a frame
 *
 * Raised before any partition is processed, so no partial output exists.
 *
 * @example
 * ```typescript
 * throw InvalidArgumentError.delimiterCountMismatch(3, 2);
 * throw InvalidArgumentError.columnNotFound('tags', ['id', 'name']);
 * ```
 */
export class InvalidArgumentError extends FlatframeError {
  constructor(
    message: string,
    code: string = ErrorCode.INVALID_ARGUMENT,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'InvalidArgumentError';
    captureStackTrace(this, InvalidArgumentError);
  }

  static delimiterCountMismatch(columnCount: number, delimiterCount: number): InvalidArgumentError {
    return new InvalidArgumentError(
      'The number of delimiters provided does not match the number of columns provided',
      ErrorCode.DELIMITER_COUNT_MISMATCH,
      { columnCount, delimiterCount },
      `Provide one delimiter for all columns or exactly ${columnCount}`
    );
  }

  static invalidDelimiter(column: string, delimiter: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `Invalid delimiter for column "${column}": delimiter must not be empty`,
      ErrorCode.INVALID_DELIMITER,
      { column, delimiter }
    );
  }

  static columnNotFound(column: string, available: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(
      `Column "${column}" not found`,
      ErrorCode.COLUMN_NOT_FOUND,
      { column, available: [...available] },
      `Available columns: ${available.join(', ')}`
    );
  }

  static duplicateColumn(column: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `Column "${column}" is listed more than once`,
      ErrorCode.DUPLICATE_COLUMN,
      { column }
    );
  }

  static mixedColumnTypes(textColumns: readonly string[], vectorColumns: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(
      'Text and vector columns cannot be flattened in the same invocation',
      ErrorCode.MIXED_COLUMN_TYPES,
      { textColumns: [...textColumns], vectorColumns: [...vectorColumns] },
      'Flatten the text columns and the vector column in separate invocations'
    );
  }

  static multipleVectorColumns(vectorColumns: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(
      'Only one vector column can be flattened per invocation',
      ErrorCode.MULTIPLE_VECTOR_COLUMNS,
      { vectorColumns: [...vectorColumns] },
      'Flatten each vector column in its own invocation'
    );
  }

  static rowArityMismatch(expected: number, actual: number, location: Record<string, unknown>): InvalidArgumentError {
    return new InvalidArgumentError(
      `Row has ${actual} cells but the schema has ${expected} columns`,
      ErrorCode.ROW_ARITY_MISMATCH,
      { expected, actual, ...location }
    );
  }

  static invalidDataType(text: string): InvalidArgumentError {
    return new InvalidArgumentError(
      `Invalid data type: "${text}"`,
      ErrorCode.INVALID_DATA_TYPE,
      { value: text },
      'Valid types: string, int32, int64, float32, float64, bool, datetime, vector(<length>)'
    );
  }
}

// =============================================================================
// Type Errors
// =============================================================================

/**
 * Error thrown when a target column's declared type cannot be flattened
 */
export class UnsupportedTypeError extends FlatframeError {
  constructor(
    message: string,
    code: string = ErrorCode.UNSUPPORTED_COLUMN_TYPE,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'UnsupportedTypeError';
    captureStackTrace(this, UnsupportedTypeError);
  }

  static columnType(column: string, dataType: string): UnsupportedTypeError {
    return new UnsupportedTypeError(
      `Flatten column does not support type ${dataType}`,
      ErrorCode.UNSUPPORTED_COLUMN_TYPE,
      { column, dataType },
      'Only string and vector(<length>) columns can be flattened'
    );
  }
}

/**
 * Error thrown when a cell's runtime value disagrees with its column type
 *
 * @example
 * ```typescript
 * throw TypeCoercionError.typeMismatch('tags', 'string', 'number');
 * throw TypeCoercionError.vectorLengthMismatch('embedding', 3, 2);
 * ```
 */
export class TypeCoercionError extends FlatframeError {
  constructor(
    message: string,
    code: string = ErrorCode.TYPE_COERCION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'TypeCoercionError';
    captureStackTrace(this, TypeCoercionError);
  }

  static typeMismatch(column: string, expectedType: string, actualType: string): TypeCoercionError {
    return new TypeCoercionError(
      `Type mismatch in column "${column}": expected ${expectedType}, got ${actualType}`,
      ErrorCode.TYPE_COERCION_ERROR,
      { column, expectedType, actualType }
    );
  }

  static vectorLengthMismatch(column: string, expectedLength: number, actualLength: number): TypeCoercionError {
    return new TypeCoercionError(
      `Vector in column "${column}" has length ${actualLength}, expected ${expectedLength}`,
      ErrorCode.VECTOR_LENGTH_MISMATCH,
      { column, expectedLength, actualLength }
    );
  }

  /**
   * Copy of this error with the failing row's position added to its details.
   */
  atRow(partition: number, row: number): TypeCoercionError {
    const located = new TypeCoercionError(
      `${this.message} (partition ${partition}, row ${row})`,
      this.code,
      { ...this.details, partition, row },
      this.suggestion
    );
    located.stack = this.stack;
    return located;
  }
}

// =============================================================================
// Store Errors
// =============================================================================

/**
 * Error thrown when a frame id is not present in the frame store
 */
export class FrameNotFoundError extends FlatframeError {
  public readonly frameId: string;

  constructor(frameId: string) {
    super(
      `Frame "${frameId}" not found`,
      ErrorCode.FRAME_NOT_FOUND,
      { frameId },
      'Save the frame to the store before running commands against it'
    );
    this.name = 'FrameNotFoundError';
    this.frameId = frameId;
    captureStackTrace(this, FrameNotFoundError);
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

/**
 * Error thrown when a transform is aborted through its AbortSignal
 */
export class OperationCancelledError extends FlatframeError {
  constructor(operation: string, details?: Record<string, unknown>) {
    super(
      `Operation "${operation}" was cancelled`,
      ErrorCode.OPERATION_CANCELLED,
      { operation, ...details }
    );
    this.name = 'OperationCancelledError';
    captureStackTrace(this, OperationCancelledError);
  }
}

// =============================================================================
// Command Errors
// =============================================================================

/**
 * Error thrown when a command name is not registered
 */
export class CommandNotFoundError extends FlatframeError {
  public readonly commandName: string;

  constructor(commandName: string, available: readonly string[] = []) {
    super(
      `Command "${commandName}" is not registered`,
      ErrorCode.COMMAND_NOT_FOUND,
      { commandName, available: [...available] }
    );
    this.name = 'CommandNotFoundError';
    this.commandName = commandName;
    captureStackTrace(this, CommandNotFoundError);
  }
}

/**
 * Error thrown when a command cannot be added to a registry
 */
export class CommandRegistrationError extends FlatframeError {
  public readonly commandName: string;

  constructor(commandName: string, reason: string) {
    super(
      `Failed to register command "${commandName}": ${reason}`,
      ErrorCode.COMMAND_REGISTRATION_ERROR,
      { commandName, reason }
    );
    this.name = 'CommandRegistrationError';
    this.commandName = commandName;
    captureStackTrace(this, CommandRegistrationError);
  }

  static duplicate(commandName: string): CommandRegistrationError {
    return new CommandRegistrationError(commandName, 'a command with this name is already registered');
  }
}
