/**
 * Logging Middleware
 *
 * One structured log entry per request, written through a child logger
 * bound to a request id.
 */

import { randomUUID } from 'node:crypto';
import type { Middleware } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';

export interface LoggingOptions {
  excludePaths?: string[];
}

/**
 * Create request logging middleware. The request logger is left in
 * `ctx.state` under `logger` for handlers to use.
 */
export function requestLoggingMiddleware(logger: Logger, options: LoggingOptions = {}): Middleware {
  const excludePaths = options.excludePaths ?? ['/favicon.ico'];

  return async (ctx, next) => {
    const requestLogger = logger.child({ requestId: randomUUID() });
    ctx.state.set('logger', requestLogger);

    if (excludePaths.some((path) => ctx.url.pathname.startsWith(path))) {
      return await next();
    }

    const startTime = performance.now();
    const response = await next();
    const duration = Math.round((performance.now() - startTime) * 100) / 100;

    const entry = {
      method: ctx.method,
      path: ctx.url.pathname,
      status: response.status,
      duration,
    };

    if (response.status >= 500) {
      requestLogger.warn('Request failed', entry);
    } else {
      requestLogger.info('Request completed', entry);
    }

    return response;
  };
}
