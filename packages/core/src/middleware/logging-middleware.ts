/**
 * Logging Middleware
 *
 * Logs script submission for debugging and monitoring, with slow
 * script detection.
 *
 * @example
 * ```typescript
 * const middleware = createLoggingMiddleware({
 *   logger: console,
 *   logLevel: 'debug',
 *   slowScriptThreshold: 1000,
 * });
 * ```
 */

import { SUBMIT_DEFAULTS } from '../constants';
import { toError } from '../errors';

import type { Logger } from '../types';
import type {
  SubmitMiddleware,
  SubmitMiddlewareContext,
  SubmitMiddlewareResult,
  NextMiddleware,
  LoggingMiddlewareOptions,
} from './types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[batchline] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[batchline] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[batchline] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[batchline] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Collapse whitespace and truncate long scripts for logging
 */
export function excerpt(script: string, maxLength: number = SUBMIT_DEFAULTS.LOG_EXCERPT_LENGTH): string {
  const flat = script.replaceAll(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) {
    return flat;
  }
  return `${flat.slice(0, maxLength)}...`;
}

export function createLoggingMiddleware<T = unknown>(
  options: LoggingMiddlewareOptions = {},
): SubmitMiddleware<T> {
  const {
    logger = consoleLogger,
    logLevel = 'debug',
    logResults = false,
    slowScriptThreshold = SUBMIT_DEFAULTS.SLOW_SCRIPT_THRESHOLD,
  } = options;

  const log = (message: string, ...args: unknown[]): void => logger[logLevel](message, ...args);

  return async (
    context: SubmitMiddlewareContext,
    next: NextMiddleware<T>,
  ): Promise<SubmitMiddlewareResult<T>> => {
    const script = excerpt(context.script);
    const startTime = Date.now();

    log(`Submitting script: ${script}`);

    try {
      const result = await next(context);
      const duration = Date.now() - startTime;
      const slots = result.resultSet.slots;
      const failed = slots.filter((slot) => slot.status === 'ERR').length;

      if (duration >= slowScriptThreshold) {
        logger.warn(`Slow script detected (${duration}ms): ${script}`, {
          duration,
          statements: slots.length,
        });
      }

      const message = `Script completed in ${duration}ms (${slots.length} results, ${failed} failed)`;
      if (logResults && slots.length > 0) {
        log(message, { slots: slots.slice(0, 5) });
      } else {
        log(message);
      }

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`Script failed after ${duration}ms: ${toError(error).message}`, {
        script,
        error,
      });
      throw error;
    }
  };
}
