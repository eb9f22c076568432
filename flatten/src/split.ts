/**
 * Split `value` on a literal delimiter.
 *
 * The delimiter is matched as plain text, so pattern metacharacters such as
 * `|`, `.` or `$` need no escaping. Trailing empty tokens are dropped while
 * leading and interior ones are kept:
 *
 * ```typescript
 * splitLiteral('a,b,c', ',');  // ['a', 'b', 'c']
 * splitLiteral('a,b,,', ',');  // ['a', 'b']
 * splitLiteral(',a', ',');     // ['', 'a']
 * splitLiteral(',,', ',');     // []
 * splitLiteral('', ',');       // ['']
 * ```
 */
export function splitLiteral(value: string, delimiter: string): string[] {
  if (value.length === 0) {
    return [value];
  }
  const tokens = value.split(delimiter);
  let end = tokens.length;
  while (end > 0 && tokens[end - 1] === '') {
    end--;
  }
  return end === tokens.length ? tokens : tokens.slice(0, end);
}
