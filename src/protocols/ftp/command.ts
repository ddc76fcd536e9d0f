/**
 * Command invocation wrapper
 *
 * Brackets a command-shaped operation with a debug entry log and, on failure,
 * an error log carrying the command name. The fault itself is rethrown as is;
 * callers decide retry or abort.
 */

import { getDefaultLogger, type Logger } from '../../types/logger.js';

const MASKED_COMMANDS = new Set(['PASS']);

function describeArgs(command: string, args: readonly unknown[]): readonly unknown[] {
  return MASKED_COMMANDS.has(command) ? args.map(() => '****') : args;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function logStart(logger: Logger, command: string, args: readonly unknown[]): void {
  logger.debug({ command, args: describeArgs(command, args) }, `>>> ${command}`);
}

function logFailure(logger: Logger, command: string, args: readonly unknown[], error: unknown): void {
  logger.error(
    {
      command,
      args: describeArgs(command, args),
      error: describeError(error),
      errorName: error instanceof Error ? error.name : typeof error,
    },
    `FTP command ${command} failed: ${describeError(error)}`
  );
}

/**
 * Run a synchronous command operation with logging
 *
 * @example
 * ```typescript
 * const arg = invokeCommand('port', [host, port], () => buildActiveCommandArgument(host, port));
 * ```
 */
export function invokeCommand<T>(
  name: string,
  args: readonly unknown[],
  operation: () => T,
  logger: Logger = getDefaultLogger()
): T {
  const command = name.toUpperCase();
  logStart(logger, command, args);

  try {
    return operation();
  } catch (error) {
    logFailure(logger, command, args, error);
    throw error;
  }
}

/**
 * Run an asynchronous command operation with logging
 *
 * Suspends exactly where the operation suspends; a rejection is logged and
 * passed on with the same error object.
 */
export async function invokeCommandAsync<T>(
  name: string,
  args: readonly unknown[],
  operation: () => Promise<T>,
  logger: Logger = getDefaultLogger()
): Promise<T> {
  const command = name.toUpperCase();
  logStart(logger, command, args);

  try {
    return await operation();
  } catch (error) {
    logFailure(logger, command, args, error);
    throw error;
  }
}

/**
 * Wrap a function so that every call goes through {@link invokeCommand}
 */
export function wrapCommand<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R,
  logger?: Logger
): (...args: A) => R {
  return (...args: A) => invokeCommand(name, args, () => fn(...args), logger);
}

/**
 * Wrap an async function so that every call goes through {@link invokeCommandAsync}
 */
export function wrapAsyncCommand<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => Promise<R>,
  logger?: Logger
): (...args: A) => Promise<R> {
  return (...args: A) => invokeCommandAsync(name, args, () => fn(...args), logger);
}
