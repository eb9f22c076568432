/**
 * Multi-column text alignment.
 *
 * Several text columns of one row are split together and their tokens are
 * lined up by position: output row `p` holds token `p` of every column that
 * has one. Columns are processed one after another, in request order, against
 * an arena of output rows addressed by position:
 *
 * - a column with k > 1 tokens writes token `p` into arena row `p`, creating
 *   the row when the arena is shorter than `p + 1`. A created row starts as a
 *   copy of the input row with every other target column blanked to `""`.
 * - a column with k <= 1 tokens only touches arena row 0 (seeding it with the
 *   input row when the arena is still empty).
 *
 * The result can depend on column order. A seeding column keeps its raw cell,
 * so `"a,"` stays `"a,"` when its column comes first and becomes its single
 * token `"a"` otherwise; that write happens even when nothing else splits.
 *
 * @example
 * ```typescript
 * const flatten = flattenRowByTextColumns([
 *   { kind: 'text', name: 'a', index: 0, delimiter: ',' },
 *   { kind: 'text', name: 'b', index: 1, delimiter: ',' },
 * ]);
 * flatten(['x,y', 'p']);
 * // [['x', 'p'], ['y', '']]
 * ```
 */

import { toText, type CellValue, type Row } from '@flatframe/core';
import { splitLiteral } from './split.js';
import { flattenRowByTextColumn } from './text-splitter.js';
import type { RowFlattener, TextColumnSpec } from './types.js';

/**
 * Output rows for one input row. A slot either still references the input
 * row or holds a buffer this arena owns and may write in place.
 */
class RowArena {
  private readonly slots: Row[] = [];
  private readonly owned: (CellValue[] | undefined)[] = [];

  constructor(
    private readonly source: Row,
    private readonly targetIndices: readonly number[]
  ) {}

  get size(): number {
    return this.slots.length;
  }

  /** Seed position 0 with the input row itself */
  seed(): void {
    this.slots.push(this.source);
    this.owned.push(undefined);
  }

  /** Append a copy of the input row with the other target columns blanked */
  create(index: number, value: CellValue): void {
    const buffer = this.source.slice();
    for (const target of this.targetIndices) {
      if (target !== index) {
        buffer[target] = '';
      }
    }
    buffer[index] = value;
    this.slots.push(buffer);
    this.owned.push(buffer);
  }

  write(position: number, index: number, value: CellValue): void {
    if (this.slots[position][index] === value) {
      return;
    }
    let buffer = this.owned[position];
    if (buffer === undefined) {
      buffer = this.slots[position].slice();
      this.owned[position] = buffer;
      this.slots[position] = buffer;
    }
    buffer[index] = value;
  }

  rows(): Row[] {
    return this.slots;
  }
}

/**
 * Build the row function for text targets. A single column goes straight to
 * the single-column splitter.
 *
 * @throws TypeCoercionError (per row) when a target cell is neither a string
 *         nor null
 */
export function flattenRowByTextColumns(specs: readonly TextColumnSpec[]): RowFlattener {
  if (specs.length === 1) {
    return flattenRowByTextColumn(specs[0]);
  }
  const targetIndices = specs.map(spec => spec.index);

  return (row) => {
    const arena = new RowArena(row, targetIndices);

    for (const spec of specs) {
      const original = row[spec.index];
      const value = toText(original, spec.name);
      const tokens = value === null ? [] : splitLiteral(value, spec.delimiter);

      if (tokens.length > 1) {
        tokens.forEach((token, position) => {
          if (position < arena.size) {
            arena.write(position, spec.index, token);
          } else {
            arena.create(spec.index, token);
          }
        });
      } else if (arena.size === 0) {
        arena.seed();
      } else {
        // ",," splits into no tokens; the cell keeps its original value
        arena.write(0, spec.index, tokens.length === 1 ? tokens[0] : original);
      }
    }

    return arena.rows();
  };
}
