/**
 * Logger implementations for the contract in @flatframe/core.
 *
 * Every logger here funnels through `createLogger`, which filters by level
 * and hands finished entries to a sink: a line writer for the console
 * logger, an array for the test logger.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@flatframe/observability';
 *
 * const logger = createConsoleLogger({ format: 'json', minLevel: 'info' });
 * const commandLogger = withContext(logger, { command: 'frame/flatten_columns' });
 * commandLogger.info('Flattened columns', { rowsProcessed: 42, durationMs: 15 });
 * ```
 */

import type {
  ConsoleLoggerConfig,
  LogContext,
  LogContextValue,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  TestLogger,
} from '@flatframe/core';
import type { LogFormat, ObservabilityConfig } from '@flatframe/config';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * True when `value` survives JSON serialization unchanged: primitives other
 * than undefined, arrays and plain objects of those. Dates, maps and class
 * instances are rejected.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isLogContextValue);
      return isPlainObject(value) && Object.values(value).every(isLogContextValue);
    default:
      return false;
  }
}

/**
 * Logger that builds entries at or above `minLevel` (default debug) and
 * passes them to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const threshold = LEVEL_RANK[config.minLevel ?? 'debug'];
  const sink = config.output;

  const emit = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (sink === undefined || LEVEL_RANK[level] < threshold) return;
    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) entry.context = context;
    if (error !== undefined) entry.error = error;
    sink(entry);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, error, context) => emit('error', message, context, error),
  };
}

function toJsonLine(entry: LogEntry): string {
  const { level, message, timestamp, context, error } = entry;
  const record: Record<string, unknown> = { level, message, timestamp };
  if (context) record.context = context;
  if (error) record.error = { name: error.name, message: error.message, stack: error.stack };
  return JSON.stringify(record);
}

function toPrettyLine(entry: LogEntry): string {
  const lines = [`[${new Date(entry.timestamp).toISOString()}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`];
  if (entry.context) {
    lines[0] += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    lines.push(`  Error: ${entry.error.message}`);
    if (entry.error.stack) lines.push(`  ${entry.error.stack}`);
  }
  return lines.join('\n');
}

/** Render an entry the way createConsoleLogger writes it */
export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  return format === 'json' ? toJsonLine(entry) : toPrettyLine(entry);
}

/**
 * Logger that writes one line per entry, to stdout unless `write` is given.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';
  const write = config.write ?? ((line: string) => console.log(line));
  return createLogger({
    minLevel: config.minLevel,
    output: entry => write(formatLogEntry(entry, format)),
  });
}

export function createLoggerFromConfig(config: ObservabilityConfig, write?: (line: string) => void): Logger {
  return createConsoleLogger({ minLevel: config.logLevel, format: config.logFormat, write });
}

export function createNoopLogger(): Logger {
  return createLogger();
}

/**
 * Logger that keeps its entries in memory for assertions. `output`, when
 * given, still sees every captured entry.
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const captured: LogEntry[] = [];
  const logger = createLogger({
    minLevel: config.minLevel,
    output: entry => {
      captured.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...logger,
    getLogs: () => captured.slice(),
    getLogsByLevel: level => captured.filter(entry => entry.level === level),
    clear: () => {
      captured.length = 0;
    },
  };
}

/**
 * Child logger whose entries carry `context`. Keys passed at the call site
 * override the fixed ones.
 *
 * @example
 * ```typescript
 * const frameLogger = withContext(withContext(root, { command: 'frame/flatten_columns' }), { frame: 'orders' });
 * frameLogger.info('Loaded frame'); // context: { command, frame }
 * ```
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merged = (local?: LogContext): LogContext => (local === undefined ? context : { ...context, ...local });
  return {
    debug: (message, local) => logger.debug(message, merged(local)),
    info: (message, local) => logger.info(message, merged(local)),
    warn: (message, local) => logger.warn(message, merged(local)),
    error: (message, error, local) => logger.error(message, error, merged(local)),
  };
}
