/**
 * Single-column text splitter and vector splitter
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, TypeCoercionError, type Row } from '@flatframe/core';
import { flattenRowByTextColumn } from '../text-splitter.js';
import { flattenRowByVectorColumn } from '../vector-splitter.js';
import type { TextColumnSpec, VectorColumnSpec } from '../types.js';

const tags: TextColumnSpec = { kind: 'text', name: 'tags', index: 1, delimiter: ',' };
const embedding: VectorColumnSpec = { kind: 'vector', name: 'embedding', index: 1, length: 3 };

describe('flattenRowByTextColumn', () => {
  const flatten = flattenRowByTextColumn(tags);

  it('should emit one row per token in token order', () => {
    expect(flatten([1, 'a,b,c', true])).toEqual([
      [1, 'a', true],
      [1, 'b', true],
      [1, 'c', true],
    ]);
  });

  it('should return the input row itself when nothing splits', () => {
    const row: Row = [1, 'dog', true];
    const result = flatten(row);

    expect(result).toHaveLength(1);
    expect(result[0]).toBe(row);
  });

  it('should keep null and empty cells as they are', () => {
    const nullRow: Row = [1, null, true];
    const emptyRow: Row = [1, '', true];

    expect(flatten(nullRow)[0]).toBe(nullRow);
    expect(flatten(emptyRow)[0]).toBe(emptyRow);
  });

  it('should keep the original value when the cell is only delimiters', () => {
    const row: Row = [1, ',,', true];
    expect(flatten(row)).toEqual([row]);
  });

  it('should keep leading empty tokens and drop trailing ones', () => {
    expect(flatten([1, ',x,', false])).toEqual([
      [1, '', false],
      [1, 'x', false],
    ]);
  });

  it('should not modify the input row', () => {
    const row: Row = [1, 'a,b', true];
    flatten(row);
    expect(row).toEqual([1, 'a,b', true]);
  });

  it('should split on pattern metacharacters literally', () => {
    const flattenPipes = flattenRowByTextColumn({ ...tags, delimiter: '|' });
    expect(flattenPipes([0, 'a|b', null])).toEqual([
      [0, 'a', null],
      [0, 'b', null],
    ]);
  });

  it('should reject cells that are not text', () => {
    expect(() => flatten([1, 42, true])).toThrow(TypeCoercionError);
  });
});

describe('flattenRowByVectorColumn', () => {
  const flatten = flattenRowByVectorColumn(embedding);

  it('should emit one row per element in element order', () => {
    expect(flatten(['id-1', [1.0, 2.0, 3.0], 'x'])).toEqual([
      ['id-1', 1, 'x'],
      ['id-1', 2, 'x'],
      ['id-1', 3, 'x'],
    ]);
  });

  it('should accept vectors stored as text', () => {
    expect(flatten(['id-2', '[0.5, 1.5, 2.5]', 'y']).map(row => row[1])).toEqual([0.5, 1.5, 2.5]);
  });

  it('should reject vectors of the wrong length', () => {
    try {
      flatten(['id-3', [1, 2], 'z']);
      expect.fail('expected VECTOR_LENGTH_MISMATCH');
    } catch (error) {
      expect(error).toBeInstanceOf(TypeCoercionError);
      if (error instanceof TypeCoercionError) {
        expect(error.code).toBe(ErrorCode.VECTOR_LENGTH_MISMATCH);
      }
    }
  });

  it('should reject cells that are not vectors', () => {
    expect(() => flatten(['id-4', true, 'z'])).toThrow(
      'Type mismatch in column "embedding": expected vector(3), got boolean'
    );
  });
});
