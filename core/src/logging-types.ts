/**
 * Logging Type Definitions for flatframe
 *
 * Core exports only the Logger contract. Implementations live in
 * @flatframe/observability, so code that only accepts a logger does not
 * depend on it:
 *
 * ```typescript
 * import type { Logger } from '@flatframe/core';
 *
 * function transform(logger: Logger): void {
 *   logger.info('Transform started', { operation: 'flatten' });
 * }
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Allowed value types in log context (JSON-serializable)
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries
 */
export interface LogContext {
  /** Command being executed, e.g. frame/flatten_columns */
  command?: string;
  /** Frame identifier */
  frame?: string;
  operation?: string;
  durationMs?: number;
  rowsProcessed?: number;
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  format?: 'json' | 'pretty';
  /** Line sink (default: console.log) */
  write?: (line: string) => void;
}

/**
 * Test logger with additional methods for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}
