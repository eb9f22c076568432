/**
 * Command contracts.
 *
 * A command is a named, documented operation over frames in a FrameStore.
 * Hosts resolve commands by name through a CommandRegistry and hand them raw
 * arguments; each command validates its own.
 */

import type { FrameStore, Logger } from '@flatframe/core';
import type { FlattenConfig } from '@flatframe/config';

export interface CommandDoc {
  /** One-line summary */
  oneLine: string;
  extended?: string;
}

/**
 * Everything a command needs from its host for one run
 */
export interface Invocation {
  store: FrameStore;
  logger: Logger;
  config: FlattenConfig;
  signal?: AbortSignal;
}

export interface Command<TArgs = unknown, TResult = unknown> {
  /** Unique name, e.g. "frame/flatten_columns" */
  readonly name: string;
  readonly doc: CommandDoc;

  /** Jobs the host should budget for a run with these arguments */
  numberOfJobs(args: TArgs): number;

  /**
   * @throws InvalidArgumentError (INVALID_ARGUMENTS) when `raw` is malformed
   */
  parseArguments(raw: unknown): TArgs;

  execute(args: TArgs, invocation: Invocation): Promise<TResult>;
}
