// Column data types and cell values for row-oriented frames

import { InvalidArgumentError } from './errors.js';

// =============================================================================
// Data Types
// =============================================================================

/** Scalar type discriminators */
export type ScalarKind =
  | 'string'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'bool'
  | 'datetime';

/** A column type that holds one scalar per cell */
export interface ScalarDataType {
  readonly kind: ScalarKind;
}

/** A column type that holds a fixed-length numeric vector per cell */
export interface VectorDataType {
  readonly kind: 'vector';
  /** Number of elements in every cell of the column */
  readonly length: number;
}

/**
 * Declared type of a frame column.
 *
 * @example
 * ```typescript
 * const tags: DataType = DataTypes.string;
 * const embedding: DataType = DataTypes.vector(3);
 * ```
 */
export type DataType = ScalarDataType | VectorDataType;

export type DataTypeKind = DataType['kind'];

const SCALAR_KINDS: readonly ScalarKind[] = [
  'string',
  'int32',
  'int64',
  'float32',
  'float64',
  'bool',
  'datetime',
];

function isScalarKind(text: string): text is ScalarKind {
  return SCALAR_KINDS.some(kind => kind === text);
}

/**
 * Data type constants and the vector type constructor
 */
export const DataTypes = {
  string: { kind: 'string' } satisfies ScalarDataType,
  int32: { kind: 'int32' } satisfies ScalarDataType,
  int64: { kind: 'int64' } satisfies ScalarDataType,
  float32: { kind: 'float32' } satisfies ScalarDataType,
  float64: { kind: 'float64' } satisfies ScalarDataType,
  bool: { kind: 'bool' } satisfies ScalarDataType,
  datetime: { kind: 'datetime' } satisfies ScalarDataType,

  /**
   * Vector type of the given length.
   * @throws InvalidArgumentError if length is not a positive integer
   */
  vector(length: number): VectorDataType {
    if (!Number.isInteger(length) || length <= 0) {
      throw InvalidArgumentError.invalidDataType(`vector(${length})`);
    }
    return { kind: 'vector', length };
  },
};

export function isVectorType(dataType: DataType): dataType is VectorDataType {
  return dataType.kind === 'vector';
}

export function isTextType(dataType: DataType): boolean {
  return dataType.kind === 'string';
}

export function dataTypesEqual(a: DataType, b: DataType): boolean {
  if (isVectorType(a) && isVectorType(b)) {
    return a.length === b.length;
  }
  return a.kind === b.kind;
}

/** Render a data type, e.g. `string` or `vector(3)` */
export function formatDataType(dataType: DataType): string {
  return isVectorType(dataType) ? `vector(${dataType.length})` : dataType.kind;
}

const VECTOR_TYPE_PATTERN = /^vector\((\d+)\)$/;

/**
 * Parse the textual form produced by formatDataType.
 * @throws InvalidArgumentError for unknown names or a zero vector length
 */
export function parseDataType(text: string): DataType {
  const normalized = text.trim().toLowerCase();
  if (isScalarKind(normalized)) {
    return { kind: normalized };
  }
  const match = VECTOR_TYPE_PATTERN.exec(normalized);
  if (match) {
    const length = Number(match[1]);
    if (length > 0) {
      return DataTypes.vector(length);
    }
  }
  throw InvalidArgumentError.invalidDataType(text);
}

// =============================================================================
// Cells and Rows
// =============================================================================

/** A single cell. Vector columns hold numeric arrays. */
export type CellValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | null
  | readonly number[];

/**
 * Ordered, fixed-arity sequence of cells, addressed by column position.
 * Rows are never mutated once built; transforms copy before writing.
 */
export type Row = readonly CellValue[];

/** Copy of `row` with the cell at `index` replaced */
export function withCell(row: Row, index: number, value: CellValue): Row {
  const next = row.slice();
  next[index] = value;
  return next;
}

/** Describe a cell's runtime type for error messages */
export function describeCell(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  return typeof value;
}

// =============================================================================
// Exhaustiveness
// =============================================================================

/**
 * Compile-time exhaustiveness check for discriminated unions.
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`);
}
