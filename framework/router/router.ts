/**
 * URL Router
 *
 * Maps method and path to a handler using URLPattern for matching.
 */

import { URLPattern } from 'urlpattern-polyfill';
import type { HttpMethod, Middleware, RouteHandler } from '../http/types.ts';
import { buildUrl, type PatternParams } from './patterns.ts';

export interface RouteDefinition {
  method: HttpMethod | HttpMethod[];
  path: string;
  pattern: URLPattern;
  handler: RouteHandler;
  middleware: Middleware[];
  name?: string;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: PatternParams;
  handler: RouteHandler;
}

export interface RouteOptions {
  name?: string;
  middleware?: Middleware[];
}

function acceptsMethod(route: RouteDefinition, method: string): boolean {
  const methods: string[] = Array.isArray(route.method) ? route.method : [route.method];
  // HEAD is answered by the GET handler
  return methods.includes(method) || (method === 'HEAD' && methods.includes('GET'));
}

// Paths arrive percent-encoded; handlers see decoded params
function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * URL Router
 */
export class Router {
  private routes: RouteDefinition[] = [];
  private namedRoutes = new Map<string, RouteDefinition>();

  constructor(private prefix: string = '') {}

  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('GET', path, handler, options);
  }

  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('POST', path, handler, options);
  }

  /**
   * Add a route with explicit method
   */
  addRoute(
    method: HttpMethod | HttpMethod[],
    path: string,
    handler: RouteHandler,
    options: RouteOptions = {}
  ): this {
    const fullPath = this.prefix + path;

    const route: RouteDefinition = {
      method,
      path: fullPath,
      pattern: new URLPattern({ pathname: fullPath }),
      handler,
      middleware: options.middleware ?? [],
      name: options.name,
    };

    this.routes.push(route);

    if (options.name) {
      this.namedRoutes.set(options.name, route);
    }

    return this;
  }

  /**
   * Mount a sub-router's routes under a prefix
   */
  mount(prefix: string, router: Router): this {
    for (const route of router.routes) {
      const fullPath = this.prefix + prefix + route.path;
      const mounted: RouteDefinition = {
        ...route,
        path: fullPath,
        pattern: new URLPattern({ pathname: fullPath }),
      };
      this.routes.push(mounted);

      if (mounted.name) {
        this.namedRoutes.set(mounted.name, mounted);
      }
    }

    return this;
  }

  /**
   * Match a method and path to a route. First registered match wins.
   */
  match(method: string, path: string): RouteMatch | null {
    const url = new URL(path, 'http://localhost');

    for (const route of this.routes) {
      if (!acceptsMethod(route, method)) {
        continue;
      }

      const result = route.pattern.exec(url);
      if (result) {
        const params: PatternParams = {};
        for (const [key, value] of Object.entries(result.pathname.groups)) {
          if (value !== undefined) {
            params[key] = decodeParam(value);
          }
        }
        return { route, params, handler: route.handler };
      }
    }

    return null;
  }

  /**
   * True when some route matches the path under any method
   */
  hasPath(path: string): boolean {
    const url = new URL(path, 'http://localhost');
    return this.routes.some((route) => route.pattern.test(url));
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: PatternParams = {}, query?: Record<string, string>): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;
    return buildUrl(route.path, params, query);
  }
}
