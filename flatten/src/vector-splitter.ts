import { toVector, withCell } from '@flatframe/core';
import type { RowFlattener, VectorColumnSpec } from './types.js';

/**
 * One output row per vector element, in element order. Each output row is
 * the input row with the vector cell replaced by that element.
 *
 * For row `[1, [0.5, 1.5]]` and the vector at index 1 this yields
 * `[1, 0.5]` and `[1, 1.5]`.
 *
 * @throws TypeCoercionError when the cell is not a vector of `spec.length`
 */
export function flattenRowByVectorColumn(spec: VectorColumnSpec): RowFlattener {
  return (row) =>
    toVector(row[spec.index], spec.length, spec.name).map(element => withCell(row, spec.index, element));
}
