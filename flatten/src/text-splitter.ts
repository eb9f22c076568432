import { toText, withCell } from '@flatframe/core';
import { splitLiteral } from './split.js';
import type { RowFlattener, TextColumnSpec } from './types.js';

/**
 * Split a single text column.
 *
 * E.g. for row `[1, "dog,cat"]`, flattening the second column yields
 * `[1, "dog"]` and `[1, "cat"]`. When the value does not split into more
 * than one token (including a null cell) the input row itself is returned.
 *
 * @throws TypeCoercionError when the cell is neither a string nor null
 */
export function flattenRowByTextColumn(spec: TextColumnSpec): RowFlattener {
  return (row) => {
    const value = toText(row[spec.index], spec.name);
    if (value === null) {
      return [row];
    }
    const tokens = splitLiteral(value, spec.delimiter);
    if (tokens.length <= 1) {
      return [row];
    }
    return tokens.map(token => withCell(row, spec.index, token));
  };
}
