/**
 * Argument schema for the flatten columns command.
 */

import { z } from 'zod';
import { ErrorCode, InvalidArgumentError } from '@flatframe/core';

export const FlattenColumnArgsSchema = z.object({
  /** Id of the frame to flatten in place */
  frame: z.string().min(1),
  columns: z.array(z.string().min(1)).min(1),
  /** Omitted or empty means the default delimiter for every column */
  delimiters: z.array(z.string()).optional(),
});

export type FlattenColumnArgs = z.infer<typeof FlattenColumnArgsSchema>;

/**
 * Validate raw command arguments.
 *
 * @throws InvalidArgumentError (INVALID_ARGUMENTS) listing every issue as
 *         `path: message`
 */
export function parseFlattenColumnArgs(raw: unknown): FlattenColumnArgs {
  const result = FlattenColumnArgsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message }));
    throw new InvalidArgumentError(
      `Invalid flatten columns arguments: ${issues.map(i => `${i.path}: ${i.message}`).join(', ')}`,
      ErrorCode.INVALID_ARGUMENTS,
      { issues }
    );
  }
  return result.data;
}
