/**
 * Frame: a schema plus rows grouped into partitions.
 *
 * Partitions are the unit of parallel work for row transforms. Rows within a
 * partition keep their order; partitions keep theirs.
 */

import { DEFAULT_PARTITION_SIZE } from './constants.js';
import { InvalidArgumentError } from './errors.js';
import type { FrameSchema } from './schema.js';
import type { Row } from './types.js';

export type Partition = readonly Row[];

export class Frame {
  readonly schema: FrameSchema;
  readonly partitions: readonly Partition[];

  /**
   * @throws InvalidArgumentError (ROW_ARITY_MISMATCH) if any row's length
   *         differs from the schema's column count
   */
  constructor(schema: FrameSchema, partitions: readonly Partition[]) {
    partitions.forEach((partition, partitionIndex) => {
      partition.forEach((row, rowIndex) => {
        if (row.length !== schema.arity) {
          throw InvalidArgumentError.rowArityMismatch(schema.arity, row.length, {
            partition: partitionIndex,
            row: rowIndex,
          });
        }
      });
    });
    this.schema = schema;
    this.partitions = partitions;
  }

  /**
   * Split a flat row list into partitions of at most `partitionSize` rows.
   * An empty row list produces a frame with no partitions.
   */
  static fromRows(schema: FrameSchema, rows: readonly Row[], partitionSize = DEFAULT_PARTITION_SIZE): Frame {
    if (!Number.isInteger(partitionSize) || partitionSize <= 0) {
      throw new InvalidArgumentError(
        `Partition size must be a positive integer, got ${partitionSize}`,
        undefined,
        { partitionSize }
      );
    }
    const partitions: Partition[] = [];
    for (let start = 0; start < rows.length; start += partitionSize) {
      partitions.push(rows.slice(start, start + partitionSize));
    }
    return new Frame(schema, partitions);
  }

  get rowCount(): number {
    return this.partitions.reduce((count, partition) => count + partition.length, 0);
  }

  get partitionCount(): number {
    return this.partitions.length;
  }

  /** All rows, partition by partition */
  rows(): Row[] {
    return this.partitions.flat();
  }
}
