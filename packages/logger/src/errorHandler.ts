/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures crashes are logged before the process terminates.
 */

import type { EventEmitter } from 'node:events';
import type { Logger } from './types.js';

/**
 * Time to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Emitters that already carry handlers.
 */
const attachedTargets = new WeakSet<EventEmitter>();

export interface GlobalHandlerOptions {
  /** Emitter to listen on. Defaults to `process`. */
  target?: EventEmitter;

  /** Called with the exit code once the logger has flushed. Defaults to `process.exit`. */
  exit?: (code: number) => void;
}

function describeReason(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Attaches fail-fast handlers for uncaught exceptions and unhandled rejections.
 *
 * The error is logged, the logger is flushed and the process exits with code 1.
 * Process warnings are logged at `warn` without exiting.
 *
 * @returns A function that removes the handlers again
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn', stderr: true });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(
  logger: Logger,
  options: GlobalHandlerOptions = {}
): () => void {
  const target = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  if (attachedTargets.has(target)) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeReason(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, exit, 1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeReason(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, exit, 1);
  };

  const warningHandler = (warning: Error): void => {
    logger.warn('Process warning emitted', {
      warning: describeReason(warning),
      event: 'warning',
    });
  };

  target.on('uncaughtException', uncaughtExceptionHandler);
  target.on('unhandledRejection', unhandledRejectionHandler);
  target.on('warning', warningHandler);
  attachedTargets.add(target);

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return () => {
    target.off('uncaughtException', uncaughtExceptionHandler);
    target.off('unhandledRejection', unhandledRejectionHandler);
    target.off('warning', warningHandler);
    attachedTargets.delete(target);
  };
}

/**
 * Exits once the logger emits 'finish', or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exit: (code: number) => void, exitCode: number): void {
  let exited = false;
  const finish = (): void => {
    if (!exited) {
      exited = true;
      clearTimeout(timeoutId);
      exit(exitCode);
    }
  };

  // Keeps the event loop alive until the exit code is delivered
  const timeoutId = setTimeout(finish, FLUSH_TIMEOUT_MS);

  logger.on('finish', finish);
  logger.end();
}
