/**
 * Flatten Types
 *
 * A TargetColumnSpec is resolved once per invocation from the schema and the
 * command arguments and then shared, read-only, by every row transform.
 */

import type { FrameSchema, Row } from '@flatframe/core';

/** A string column split on a literal delimiter */
export interface TextColumnSpec {
  readonly kind: 'text';
  readonly name: string;
  /** Cell position in every row */
  readonly index: number;
  readonly delimiter: string;
}

/** A vector column spread over one row per element */
export interface VectorColumnSpec {
  readonly kind: 'vector';
  readonly name: string;
  readonly index: number;
  readonly length: number;
}

export type TargetColumnSpec = TextColumnSpec | VectorColumnSpec;

/**
 * Expands one input row into one or more output rows. Implementations never
 * mutate the input row and hold no state between calls.
 */
export type RowFlattener = (row: Row) => Row[];

/**
 * Everything the row-stream transformer needs, resolved before any row is
 * touched.
 */
export interface FlattenPlan {
  /** Target columns in request order */
  readonly specs: readonly TargetColumnSpec[];
  readonly flattener: RowFlattener;
  /** Input schema with vector targets narrowed to float64 */
  readonly outputSchema: FrameSchema;
}
