/**
 * Middleware Types
 *
 * Type definitions for the submit middleware pattern.
 */

import type { Logger, LogLevel, ResultSet, SubmitOptions } from '../types';

/**
 * Context passed through the middleware chain
 */
export interface SubmitMiddlewareContext {
  script: string;
  options?: SubmitOptions;
  startTime: number;
  metadata: Record<string, unknown>;
}

/**
 * Result returned from middleware
 */
export interface SubmitMiddlewareResult<T = unknown> {
  resultSet: ResultSet<T>;
  duration?: number;
}

/**
 * Next function to call the next middleware in chain
 */
export type NextMiddleware<T = unknown> = (
  context: SubmitMiddlewareContext,
) => Promise<SubmitMiddlewareResult<T>>;

/**
 * Middleware function signature
 */
export type SubmitMiddleware<T = unknown> = (
  context: SubmitMiddlewareContext,
  next: NextMiddleware<T>,
) => Promise<SubmitMiddlewareResult<T>>;

/**
 * Logging middleware specific options
 */
export interface LoggingMiddlewareOptions {
  logger?: Logger;
  logLevel?: LogLevel;
  logResults?: boolean;
  slowScriptThreshold?: number;
}
