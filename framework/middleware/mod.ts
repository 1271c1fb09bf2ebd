/**
 * Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 * Implements the onion model where each middleware wraps the next.
 */

export { MiddlewarePipeline, conditional, forPath, forMethods } from './pipeline.ts';
export { requestLoggingMiddleware, type LoggingOptions } from './logging.ts';
