/**
 * Middleware Pipeline
 *
 * Manages the execution of middleware in a chain (onion model).
 * Each middleware can:
 * - Inspect the request before the handler
 * - Short-circuit with an early response
 * - Inspect or replace the response after the handler
 */

import type { Context, Middleware, Next } from '../http/types.ts';

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  constructor(middleware: Middleware[] = []) {
    this.middleware = [...middleware];
  }

  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  get length(): number {
    return this.middleware.length;
  }

  /**
   * Run every middleware in order, then the final handler
   */
  async execute(ctx: Context, finalHandler: (ctx: Context) => Promise<Response> | Response): Promise<Response> {
    let index = -1;

    const dispatch = async (i: number): Promise<Response> => {
      if (i <= index) {
        throw new Error('next() called multiple times');
      }
      index = i;

      const middleware = this.middleware[i];
      if (!middleware) {
        return await finalHandler(ctx);
      }
      const next: Next = () => dispatch(i + 1);
      return await middleware(ctx, next);
    };

    return await dispatch(0);
  }

  /**
   * Collapse the pipeline into a single middleware
   */
  compose(): Middleware {
    return (ctx, next) => this.execute(ctx, () => next());
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (ctx: Context) => boolean,
  middleware: Middleware
): Middleware {
  return async (ctx, next) => {
    if (condition(ctx)) {
      return await middleware(ctx, next);
    }
    return await next();
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath(pathPrefix: string, middleware: Middleware): Middleware {
  return conditional((ctx) => ctx.url.pathname.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods(methods: string[], middleware: Middleware): Middleware {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((ctx) => methodSet.has(ctx.method), middleware);
}
