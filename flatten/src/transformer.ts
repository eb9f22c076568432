/**
 * Row-stream transform over a partitioned frame.
 *
 * Partitions are independent: each is expanded row by row with the plan's
 * row function, and up to `maxParallelism` partitions are in flight at once.
 * Output partitions line up with input partitions, and rows within a
 * partition keep input order.
 */

import {
  DEFAULT_MAX_PARALLELISM,
  Frame,
  InvalidArgumentError,
  OperationCancelledError,
  TypeCoercionError,
  type Partition,
  type Row,
} from '@flatframe/core';
import type { FlattenPlan, RowFlattener } from './types.js';

export interface TransformOptions {
  /** Maximum partitions processed concurrently (default 4) */
  maxParallelism?: number;
  /** Checked up front and before each batch of partitions */
  signal?: AbortSignal;
}

export interface TransformStats {
  inputRows: number;
  outputRows: number;
  partitions: number;
  durationMs: number;
}

export interface TransformResult {
  frame: Frame;
  stats: TransformStats;
}

function expandPartition(partition: Partition, partitionIndex: number, flattener: RowFlattener): Row[] {
  const output: Row[] = [];
  partition.forEach((row, rowIndex) => {
    let expanded: Row[];
    try {
      expanded = flattener(row);
    } catch (error) {
      if (error instanceof TypeCoercionError) {
        throw error.atRow(partitionIndex, rowIndex);
      }
      throw error;
    }
    for (const out of expanded) {
      output.push(out);
    }
  });
  return output;
}

function throwIfAborted(signal: AbortSignal | undefined, completed: number, total: number): void {
  if (signal?.aborted) {
    throw new OperationCancelledError('flatten', { completedPartitions: completed, totalPartitions: total });
  }
}

/**
 * Apply `plan` to every row of `frame`.
 *
 * @throws TypeCoercionError naming the partition and row of the first cell
 *         that fails; no partial frame is returned
 * @throws OperationCancelledError when `signal` is aborted
 */
export async function transformFrame(
  frame: Frame,
  plan: FlattenPlan,
  options: TransformOptions = {}
): Promise<TransformResult> {
  const maxParallelism = options.maxParallelism ?? DEFAULT_MAX_PARALLELISM;
  if (!Number.isInteger(maxParallelism) || maxParallelism <= 0) {
    throw new InvalidArgumentError(
      `maxParallelism must be a positive integer, got ${maxParallelism}`,
      undefined,
      { maxParallelism }
    );
  }

  const startTime = Date.now();
  const { partitions } = frame;
  const output: Row[][] = [];

  throwIfAborted(options.signal, 0, partitions.length);

  // Expand partitions (up to maxParallelism at a time)
  for (let i = 0; i < partitions.length; i += maxParallelism) {
    if (i > 0) {
      throwIfAborted(options.signal, i, partitions.length);
    }
    const batch = partitions.slice(i, i + maxParallelism);
    const results = await Promise.all(
      batch.map(async (partition, offset) => expandPartition(partition, i + offset, plan.flattener))
    );
    output.push(...results);
  }

  const result = new Frame(plan.outputSchema, output);
  return {
    frame: result,
    stats: {
      inputRows: frame.rowCount,
      outputRows: result.rowCount,
      partitions: result.partitionCount,
      durationMs: Date.now() - startTime,
    },
  };
}
