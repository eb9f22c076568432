/**
 * Row-stream transform over partitions
 */

import { describe, it, expect } from 'vitest';
import {
  DataTypes,
  ErrorCode,
  Frame,
  FrameSchema,
  InvalidArgumentError,
  OperationCancelledError,
  TypeCoercionError,
  type Row,
} from '@flatframe/core';
import { planFlatten } from '../planner.js';
import { transformFrame } from '../transformer.js';
import type { FlattenPlan } from '../types.js';

const schema = FrameSchema.of(['id', DataTypes.int32], ['tags', DataTypes.string]);

function makeFrame(rows: Row[], partitionSize: number): Frame {
  return Frame.fromRows(schema, rows, partitionSize);
}

const rows: Row[] = [
  [1, 'a,b'],
  [2, 'c'],
  [3, 'd,e,f'],
  [4, ''],
  [5, 'g,h'],
];

describe('transformFrame', () => {
  const plan = planFlatten(schema, ['tags']);

  it('should concatenate expanded rows in input order', async () => {
    const { frame } = await transformFrame(makeFrame(rows, 2), plan);

    expect(frame.rows()).toEqual([
      [1, 'a'],
      [1, 'b'],
      [2, 'c'],
      [3, 'd'],
      [3, 'e'],
      [3, 'f'],
      [4, ''],
      [5, 'g'],
      [5, 'h'],
    ]);
  });

  it('should keep one output partition per input partition', async () => {
    const { frame } = await transformFrame(makeFrame(rows, 2), plan);

    expect(frame.partitionCount).toBe(3);
    expect(frame.partitions[1]).toEqual([
      [3, 'd'],
      [3, 'e'],
      [3, 'f'],
      [4, ''],
    ]);
  });

  it.each([1, 2, 8])('should give the same output with maxParallelism %i', async (maxParallelism) => {
    const { frame } = await transformFrame(makeFrame(rows, 1), plan, { maxParallelism });
    expect(frame.rows().map(row => row[1])).toEqual(['a', 'b', 'c', 'd', 'e', 'f', '', 'g', 'h']);
  });

  it('should report statistics', async () => {
    const { stats } = await transformFrame(makeFrame(rows, 2), plan);

    expect(stats.inputRows).toBe(5);
    expect(stats.outputRows).toBe(9);
    expect(stats.partitions).toBe(3);
    expect(stats.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should use the plan output schema', async () => {
    const vectorSchema = FrameSchema.of(['id', DataTypes.int32], ['v', DataTypes.vector(2)]);
    const vectorPlan = planFlatten(vectorSchema, ['v']);
    const { frame } = await transformFrame(Frame.fromRows(vectorSchema, [[1, [0.5, 1.5]]]), vectorPlan);

    expect(frame.schema.toString()).toBe('id:int32, v:float64');
    expect(frame.rows()).toEqual([
      [1, 0.5],
      [1, 1.5],
    ]);
  });

  it('should handle a frame without partitions', async () => {
    const { frame, stats } = await transformFrame(makeFrame([], 2), plan);

    expect(frame.partitionCount).toBe(0);
    expect(stats.outputRows).toBe(0);
  });

  it('should name the partition and row of a bad cell', async () => {
    const frame = makeFrame([[1, 'a'], [2, 'b'], [3, 'c'], [4, 99]], 2);

    try {
      await transformFrame(frame, plan);
      expect.fail('expected TypeCoercionError');
    } catch (error) {
      expect(error).toBeInstanceOf(TypeCoercionError);
      if (error instanceof TypeCoercionError) {
        expect(error.message).toBe(
          'Type mismatch in column "tags": expected string, got number (partition 1, row 1)'
        );
        expect(error.details).toMatchObject({ column: 'tags', partition: 1, row: 1 });
      }
    }
  });

  it('should pass other errors through unchanged', async () => {
    const failure = new Error('row function failed');
    const failingPlan: FlattenPlan = {
      ...plan,
      flattener: () => {
        throw failure;
      },
    };

    await expect(transformFrame(makeFrame(rows, 2), failingPlan)).rejects.toBe(failure);
  });

  it('should reject an invalid maxParallelism', async () => {
    await expect(transformFrame(makeFrame(rows, 2), plan, { maxParallelism: 0 })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  it('should stop before the first batch when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      transformFrame(makeFrame(rows, 2), plan, { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should reject an empty frame when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      transformFrame(makeFrame([], 2), plan, { signal: controller.signal })
    ).rejects.toMatchObject({
      code: ErrorCode.OPERATION_CANCELLED,
      details: { operation: 'flatten', completedPartitions: 0, totalPartitions: 0 },
    });
  });

  it('should stop before the next batch when aborted mid-way', async () => {
    const controller = new AbortController();
    let calls = 0;
    const abortingPlan: FlattenPlan = {
      ...plan,
      flattener: (row) => {
        calls++;
        controller.abort();
        return [row];
      },
    };

    try {
      await transformFrame(makeFrame(rows, 2), abortingPlan, { maxParallelism: 1, signal: controller.signal });
      expect.fail('expected OperationCancelledError');
    } catch (error) {
      expect(error).toBeInstanceOf(OperationCancelledError);
      if (error instanceof OperationCancelledError) {
        expect(error.code).toBe(ErrorCode.OPERATION_CANCELLED);
        expect(error.details).toEqual({ operation: 'flatten', completedPartitions: 1, totalPartitions: 3 });
      }
    }
    expect(calls).toBe(2);
  });
});
