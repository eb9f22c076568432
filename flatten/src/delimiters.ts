import { DEFAULT_DELIMITER, InvalidArgumentError } from '@flatframe/core';

/**
 * Pair every target column with its delimiter.
 *
 * - no delimiters: `defaultDelimiter` for every column
 * - one delimiter: broadcast to every column
 * - one per column: used position for position
 *
 * @throws InvalidArgumentError (DELIMITER_COUNT_MISMATCH) for any other count,
 *         (INVALID_DELIMITER) for an empty delimiter
 *
 * @example
 * ```typescript
 * resolveDelimiters(['a', 'b']);              // [',', ',']
 * resolveDelimiters(['a', 'b'], ['|']);       // ['|', '|']
 * resolveDelimiters(['a', 'b'], [';', '|']);  // [';', '|']
 * ```
 */
export function resolveDelimiters(
  columns: readonly string[],
  delimiters?: readonly string[],
  defaultDelimiter: string = DEFAULT_DELIMITER
): string[] {
  let resolved: string[];
  if (delimiters === undefined || delimiters.length === 0) {
    resolved = columns.map(() => defaultDelimiter);
  } else if (delimiters.length === columns.length) {
    resolved = [...delimiters];
  } else if (delimiters.length === 1) {
    resolved = columns.map(() => delimiters[0]);
  } else {
    throw InvalidArgumentError.delimiterCountMismatch(columns.length, delimiters.length);
  }

  resolved.forEach((delimiter, i) => {
    if (delimiter.length === 0) {
      throw InvalidArgumentError.invalidDelimiter(columns[i], delimiter);
    }
  });
  return resolved;
}
