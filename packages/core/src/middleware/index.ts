/**
 * Middleware Module
 *
 * Cross-cutting concerns wrapped around session submission.
 *
 * @module middleware
 */

export * from './types';
export { MiddlewareChain } from './middleware-chain';
export { createLoggingMiddleware, consoleLogger, excerpt } from './logging-middleware';
