/**
 * HTTP Type Definitions
 */

/**
 * Request context for middleware and handlers
 */
export interface Context {
  request: Request;
  url: URL;
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  header(name: string): string | null;
  method: string;
}

/**
 * Middleware next function
 */
export type Next = () => Promise<Response>;

/**
 * Route handler using context
 */
export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

/**
 * Middleware function signature (onion model)
 */
export type Middleware = (
  ctx: Context,
  next: Next
) => Promise<Response> | Response;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
