/**
 * Runtime coercion of cells to the shape their column type declares.
 *
 * Failures raise TypeCoercionError naming the column; the row transform adds
 * the row position before the error reaches the caller.
 */

import { TypeCoercionError } from './errors.js';
import { describeCell } from './types.js';

function isNumberArray(value: unknown): value is readonly number[] {
  return Array.isArray(value) && value.every(element => typeof element === 'number');
}

function parseVectorText(text: string, column: string): number[] {
  let body = text.trim();
  if (body.startsWith('[') && body.endsWith(']')) {
    body = body.slice(1, -1).trim();
  }
  if (body === '') {
    return [];
  }
  return body.split(',').map(part => {
    const trimmed = part.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || Number.isNaN(parsed)) {
      throw TypeCoercionError.typeMismatch(column, 'vector', `string "${text}"`);
    }
    return parsed;
  });
}

/**
 * Coerce a cell to a numeric vector of exactly `length` elements.
 *
 * Accepts number arrays, Float64Array/Float32Array and comma separated
 * numeric strings (optionally wrapped in brackets). The result is always a
 * fresh array.
 *
 * @throws TypeCoercionError for any other value or a length other than `length`
 */
export function toVector(value: unknown, length: number, column: string): number[] {
  let elements: number[];
  if (isNumberArray(value)) {
    elements = [...value];
  } else if (value instanceof Float64Array || value instanceof Float32Array) {
    elements = Array.from(value);
  } else if (typeof value === 'string') {
    elements = parseVectorText(value, column);
  } else {
    throw TypeCoercionError.typeMismatch(column, `vector(${length})`, describeCell(value));
  }

  if (elements.length !== length) {
    throw TypeCoercionError.vectorLengthMismatch(column, length, elements.length);
  }
  return elements;
}

/**
 * Read a text cell. Null is passed through as null.
 *
 * @throws TypeCoercionError when the cell holds anything but a string or null
 */
export function toText(value: unknown, column: string): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null) {
    return null;
  }
  throw TypeCoercionError.typeMismatch(column, 'string', describeCell(value));
}
