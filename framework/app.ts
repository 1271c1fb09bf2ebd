/**
 * Application Class
 *
 * Ties the framework layers together: the router, the global middleware
 * pipeline, configuration, logging and the HTTP server.
 */

import { Server, type ServerOptions } from './http/server.ts';
import { Router, type RouteOptions } from './router/router.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { Config } from './config/config.ts';
import { getLogger, type Logger } from './telemetry/logger.ts';
import { withSpan, setRouteAttribute, recordSpanException, SpanKind } from './telemetry/otel.ts';
import type { Context, HttpMethod, Middleware, RouteHandler } from './http/types.ts';

export interface ApplicationOptions {
  config?: Config;
  logger?: Logger;
}

export type ErrorHandler = (ctx: Context, error: unknown) => Promise<Response> | Response;

const defaultNotFound: RouteHandler = () =>
  new Response('Not Found', { status: 404, headers: { 'Content-Type': 'text/plain; charset=utf-8' } });

const defaultError: ErrorHandler = () =>
  new Response('Internal Server Error', {
    status: 500,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  });

/**
 * Build the per-request context
 */
export function createContext(request: Request, params: Record<string, string> = {}): Context {
  const url = new URL(request.url);
  return {
    request,
    url,
    params,
    query: url.searchParams,
    state: new Map<string, unknown>(),
    header: (name: string) => request.headers.get(name),
    method: request.method,
  };
}

/**
 * Main Application class
 */
export class Application {
  readonly router: Router;
  private server: Server | null = null;
  private middleware: MiddlewarePipeline;
  private config: Config;
  private logger: Logger;
  private notFoundHandler: RouteHandler = defaultNotFound;
  private errorHandler: ErrorHandler = defaultError;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config ?? new Config();
    this.logger = options.logger ?? getLogger();
    this.router = new Router();
    this.middleware = new MiddlewarePipeline();
  }

  /**
   * Add global middleware. Global middleware also runs for unmatched paths.
   */
  use(middleware: Middleware): this {
    this.middleware.use(middleware);
    return this;
  }

  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.get(path, handler, options);
    return this;
  }

  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.post(path, handler, options);
    return this;
  }

  /**
   * Register a handler for several methods at once
   */
  route(methods: HttpMethod[], path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.addRoute(methods, path, handler, options);
    return this;
  }

  /**
   * Handler for requests no route matches
   */
  setNotFound(handler: RouteHandler): this {
    this.notFoundHandler = handler;
    return this;
  }

  /**
   * Handler for errors that escape a route handler
   */
  setErrorHandler(handler: ErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Handle a request end to end
   */
  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const method = request.method;

    return await withSpan(`${method} ${url.pathname}`, async (span) => {
      span.setAttribute('http.method', method);
      span.setAttribute('http.target', url.pathname);

      const match = this.router.match(method, url.pathname);
      const ctx = createContext(request, match?.params ?? {});

      if (match) {
        setRouteAttribute(match.route.path, method);
      }

      try {
        const response = await this.middleware.execute(ctx, async (innerCtx) => {
          if (!match) {
            return await this.notFoundHandler(innerCtx);
          }
          if (match.route.middleware.length === 0) {
            return await match.handler(innerCtx);
          }
          return await new MiddlewarePipeline(match.route.middleware).execute(innerCtx, match.handler);
        });

        span.setAttribute('http.status_code', response.status);
        return response;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error('Request error', err, { method, path: url.pathname });
        recordSpanException(err);

        return await this.renderError(ctx, error);
      }
    }, { kind: SpanKind.SERVER });
  }

  /**
   * Start the server
   */
  async listen(options: Pick<ServerOptions, 'port' | 'hostname'> = {}): Promise<void> {
    const port = options.port ?? this.config.values.port;
    const hostname = options.hostname ?? this.config.values.host;

    this.server = new Server((request) => this.handle(request), {
      port,
      hostname,
      onListen: (addr) => {
        this.logger.info(`Server listening on http://${addr.hostname}:${addr.port}`);
      },
    });

    await this.server.listen();
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }

    this.logger.info('Application stopped');
  }

  private async renderError(ctx: Context, error: unknown): Promise<Response> {
    try {
      return await this.errorHandler(ctx, error);
    } catch (handlerError) {
      const err = handlerError instanceof Error ? handlerError : new Error(String(handlerError));
      this.logger.error('Error handler failed', err);
      return defaultError(ctx, error);
    }
  }
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
