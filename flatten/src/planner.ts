/**
 * Target column planning.
 *
 * Turns a schema, the requested column names and the raw delimiter list into
 * the per-row function and output schema for one flatten invocation. Every
 * argument-level failure is raised here, before a single row is touched.
 */

import {
  DEFAULT_DELIMITER,
  InvalidArgumentError,
  UnsupportedTypeError,
  DataTypes,
  assertNever,
  formatDataType,
  type FrameSchema,
} from '@flatframe/core';
import { flattenRowByTextColumns } from './aligner.js';
import { resolveDelimiters } from './delimiters.js';
import type { FlattenPlan, TargetColumnSpec, TextColumnSpec, VectorColumnSpec } from './types.js';
import { flattenRowByVectorColumn } from './vector-splitter.js';

export interface PlanOptions {
  /** Delimiter used when the request names none (default ",") */
  defaultDelimiter?: string;
}

function resolveSpec(schema: FrameSchema, name: string, delimiter: string): TargetColumnSpec {
  const index = schema.columnIndex(name);
  const dataType = schema.columnDataType(name);
  switch (dataType.kind) {
    case 'string':
      return { kind: 'text', name, index, delimiter };
    case 'vector':
      return { kind: 'vector', name, index, length: dataType.length };
    case 'int32':
    case 'int64':
    case 'float32':
    case 'float64':
    case 'bool':
    case 'datetime':
      throw UnsupportedTypeError.columnType(name, formatDataType(dataType));
    default:
      return assertNever(dataType);
  }
}

/**
 * Resolve the requested columns against `schema`.
 *
 * @throws InvalidArgumentError for an empty or duplicated column list, a bad
 *         delimiter list, an unknown column, or a mix of text and vector
 *         targets
 * @throws UnsupportedTypeError when a target is neither text nor a vector
 */
export function planFlatten(
  schema: FrameSchema,
  columns: readonly string[],
  delimiters?: readonly string[],
  options: PlanOptions = {}
): FlattenPlan {
  if (columns.length === 0) {
    throw new InvalidArgumentError('At least one column must be specified', undefined, { columns: [] });
  }
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw InvalidArgumentError.duplicateColumn(column);
    }
    seen.add(column);
  }

  const resolved = resolveDelimiters(columns, delimiters, options.defaultDelimiter ?? DEFAULT_DELIMITER);
  const specs = columns.map((column, i) => resolveSpec(schema, column, resolved[i]));

  const textSpecs = specs.filter((spec): spec is TextColumnSpec => spec.kind === 'text');
  const vectorSpecs = specs.filter((spec): spec is VectorColumnSpec => spec.kind === 'vector');

  if (textSpecs.length > 0 && vectorSpecs.length > 0) {
    throw InvalidArgumentError.mixedColumnTypes(
      textSpecs.map(spec => spec.name),
      vectorSpecs.map(spec => spec.name)
    );
  }
  if (vectorSpecs.length > 1) {
    throw InvalidArgumentError.multipleVectorColumns(vectorSpecs.map(spec => spec.name));
  }

  if (vectorSpecs.length === 1) {
    const [vector] = vectorSpecs;
    return {
      specs,
      flattener: flattenRowByVectorColumn(vector),
      outputSchema: schema.convertType(vector.name, DataTypes.float64),
    };
  }
  return {
    specs,
    flattener: flattenRowByTextColumns(textSpecs),
    outputSchema: schema,
  };
}
