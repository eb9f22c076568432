/**
 * Stack trace capture utility
 *
 * Wraps V8's Error.captureStackTrace so error constructors can drop their
 * own frames from the trace. On engines without it the Error constructor has
 * already populated `stack`, so nothing is done.
 *
 * @example
 * ```typescript
 * class MyError extends Error {
 *   constructor(message: string) {
 *     super(message);
 *     this.name = 'MyError';
 *     captureStackTrace(this, MyError);
 *   }
 * }
 * ```
 */

/**
 * Captures a stack trace for the given error object.
 *
 * @param error - The error object to capture the stack trace on
 * @param constructorOpt - Constructor to exclude from the trace, together
 *                         with every frame above it
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (typeof Error.captureStackTrace === 'function') {
    Error.captureStackTrace(error, constructorOpt);
  }
}
