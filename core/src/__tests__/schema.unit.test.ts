/**
 * FrameSchema and Frame
 */

import { describe, it, expect } from 'vitest';
import { FrameSchema } from '../schema.js';
import { Frame } from '../frame.js';
import { DataTypes } from '../types.js';
import { ErrorCode, InvalidArgumentError } from '../errors.js';

const schema = FrameSchema.of(
  ['id', DataTypes.int32],
  ['tags', DataTypes.string],
  ['embedding', DataTypes.vector(2)]
);

describe('FrameSchema', () => {
  it('should look up columns by name', () => {
    expect(schema.arity).toBe(3);
    expect(schema.columnNames).toEqual(['id', 'tags', 'embedding']);
    expect(schema.columnIndex('tags')).toBe(1);
    expect(schema.columnDataType('embedding')).toEqual({ kind: 'vector', length: 2 });
    expect(schema.hasColumn('missing')).toBe(false);
  });

  it('should report unknown columns with the available names', () => {
    try {
      schema.columnIndex('missing');
      expect.fail('expected COLUMN_NOT_FOUND');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.code).toBe(ErrorCode.COLUMN_NOT_FOUND);
        expect(error.message).toBe('Column "missing" not found');
        expect(error.details).toEqual({ column: 'missing', available: ['id', 'tags', 'embedding'] });
      }
    }
  });

  it('should reject duplicate column names', () => {
    expect(() => FrameSchema.of(['a', DataTypes.string], ['a', DataTypes.int32])).toThrow(
      'Column "a" is listed more than once'
    );
  });

  it('should convert a column type without touching the original', () => {
    const converted = schema.convertType('embedding', DataTypes.float64);

    expect(converted.columnDataType('embedding')).toEqual({ kind: 'float64' });
    expect(schema.columnDataType('embedding')).toEqual({ kind: 'vector', length: 2 });
    expect(converted.toString()).toBe('id:int32, tags:string, embedding:float64');
  });

  it('should render name:type pairs', () => {
    expect(schema.toString()).toBe('id:int32, tags:string, embedding:vector(2)');
  });
});

describe('Frame', () => {
  it('should split rows into partitions of the requested size', () => {
    const rows = [
      [1, 'a', [0, 1]],
      [2, 'b', [1, 2]],
      [3, 'c', [2, 3]],
    ];
    const frame = Frame.fromRows(schema, rows, 2);

    expect(frame.partitionCount).toBe(2);
    expect(frame.partitions[0]).toHaveLength(2);
    expect(frame.partitions[1]).toEqual([[3, 'c', [2, 3]]]);
    expect(frame.rowCount).toBe(3);
    expect(frame.rows()).toEqual(rows);
  });

  it('should build an empty frame with no partitions', () => {
    const frame = Frame.fromRows(schema, []);
    expect(frame.partitionCount).toBe(0);
    expect(frame.rowCount).toBe(0);
  });

  it.each([0, -2, 1.5])('should reject partition size %s', (size) => {
    expect(() => Frame.fromRows(schema, [], size)).toThrow(InvalidArgumentError);
  });

  it('should reject rows whose arity differs from the schema', () => {
    try {
      new Frame(schema, [[[1, 'a', [0, 1]]], [[2, 'b']]]);
      expect.fail('expected ROW_ARITY_MISMATCH');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);
      if (error instanceof InvalidArgumentError) {
        expect(error.code).toBe(ErrorCode.ROW_ARITY_MISMATCH);
        expect(error.message).toBe('Row has 2 cells but the schema has 3 columns');
        expect(error.details).toEqual({ expected: 3, actual: 2, partition: 1, row: 0 });
      }
    }
  });
});
