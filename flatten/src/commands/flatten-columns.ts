/**
 * frame/flatten_columns
 *
 * Loads a frame, spreads the cells of the requested columns over multiple
 * rows and saves the result under the same frame id.
 */

import { FlatframeError, type Frame } from '@flatframe/core';
import { isLogContextValue, withContext } from '@flatframe/observability';
import { parseFlattenColumnArgs, type FlattenColumnArgs } from '../args.js';
import { planFlatten } from '../planner.js';
import { transformFrame, type TransformStats } from '../transformer.js';
import type { Command, CommandDoc, Invocation } from './types.js';

export const FLATTEN_COLUMNS_COMMAND = 'frame/flatten_columns';

export interface FlattenColumnsResult {
  frame: Frame;
  stats: TransformStats;
}

export class FlattenColumnsCommand implements Command<FlattenColumnArgs, FlattenColumnsResult> {
  readonly name = FLATTEN_COLUMNS_COMMAND;

  readonly doc: CommandDoc = {
    oneLine: 'Spread data to multiple rows based on cell data.',
    extended:
      'Splits cells in the specified columns into multiple rows according to a string delimiter. ' +
      'New rows are a full copy of the original row, but the specified columns only contain one value. ' +
      'The original row is deleted.',
  };

  /** One job to plan and transform, one to save */
  numberOfJobs(_args: FlattenColumnArgs): number {
    return 2;
  }

  parseArguments(raw: unknown): FlattenColumnArgs {
    return parseFlattenColumnArgs(raw);
  }

  /**
   * The store is only written once the whole frame has been transformed.
   *
   * @throws FrameNotFoundError, InvalidArgumentError, UnsupportedTypeError,
   *         TypeCoercionError or OperationCancelledError
   */
  async execute(args: FlattenColumnArgs, invocation: Invocation): Promise<FlattenColumnsResult> {
    const { store, config, signal } = invocation;
    const logger = withContext(invocation.logger, { command: this.name, frame: args.frame });

    try {
      const frame = await store.load(args.frame);
      const plan = planFlatten(frame.schema, args.columns, args.delimiters, {
        defaultDelimiter: config.defaultDelimiter,
      });

      logger.info('Flattening columns', {
        columns: args.columns,
        inputRows: frame.rowCount,
        partitions: frame.partitionCount,
      });

      const { frame: flattened, stats } = await transformFrame(frame, plan, {
        maxParallelism: config.maxParallelism,
        signal,
      });
      await store.save(args.frame, flattened);

      logger.info('Flattened columns', {
        durationMs: stats.durationMs,
        rowsProcessed: stats.inputRows,
        outputRows: stats.outputRows,
      });
      return { frame: flattened, stats };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const details = err instanceof FlatframeError ? err.details : undefined;
      logger.error('Flatten columns failed', err, {
        errorCode: err instanceof FlatframeError ? err.code : undefined,
        ...(isLogContextValue(details) ? { details } : {}),
      });
      throw error;
    }
  }
}
