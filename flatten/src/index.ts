// @flatframe/flatten
// Spread delimited text and vector cells over multiple rows

// =============================================================================
// Row Transforms
// =============================================================================

export { splitLiteral } from './split.js';
export { resolveDelimiters } from './delimiters.js';
export { flattenRowByVectorColumn } from './vector-splitter.js';
export { flattenRowByTextColumn } from './text-splitter.js';
export { flattenRowByTextColumns } from './aligner.js';
export type {
  TextColumnSpec,
  VectorColumnSpec,
  TargetColumnSpec,
  RowFlattener,
  FlattenPlan,
} from './types.js';

// =============================================================================
// Planning and Frame Transform
// =============================================================================

export { planFlatten, type PlanOptions } from './planner.js';
export {
  transformFrame,
  type TransformOptions,
  type TransformStats,
  type TransformResult,
} from './transformer.js';

// =============================================================================
// Commands
// =============================================================================

export { FlattenColumnArgsSchema, parseFlattenColumnArgs, type FlattenColumnArgs } from './args.js';
export type { Command, CommandDoc, Invocation } from './commands/types.js';
export { CommandRegistry, createDefaultRegistry } from './commands/registry.js';
export {
  FlattenColumnsCommand,
  FLATTEN_COLUMNS_COMMAND,
  type FlattenColumnsResult,
} from './commands/flatten-columns.js';
