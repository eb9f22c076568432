/**
 * @flatframe/observability
 *
 * Structured logging for flatframe. The Logger contract lives in
 * @flatframe/core; this package provides the implementations.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, createTestLogger, withContext } from '@flatframe/observability';
 *
 * const logger = createConsoleLogger({ format: 'json' });
 * logger.info('Flatten complete', { frame: 'orders', rowsProcessed: 42 });
 * ```
 */

// Re-export logging types from core
export type {
  Logger,
  LogLevel,
  LogEntry,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
  LogContext,
  LogContextValue,
} from '@flatframe/core';

export {
  isLogContextValue,
  createLogger,
  createConsoleLogger,
  createLoggerFromConfig,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
} from './logging.js';
