/**
 * Handler Results
 *
 * Route handlers decide between rendering a page and redirecting, and
 * return that decision as a value. `respond` turns it into a Response,
 * maps `NotFoundError` to the 404 page and `AuthorizationError` to a
 * redirect.
 */

import type { Context, RouteHandler } from '@framework/http/types.ts';
import { ResponseBuilder } from '@framework/http/response.ts';
import { getUser, type AuthUser } from '@framework/auth/auth.ts';
import type { SafeHtml } from '@framework/view/html.ts';
import { AuthorizationError, NotFoundError } from '../application/errors.ts';
import { notFoundPage } from './layout.ts';

export type HandlerResult =
  | { kind: 'rendered'; view: SafeHtml; status: number }
  | { kind: 'redirect'; location: string };

export function rendered(view: SafeHtml, status = 200): HandlerResult {
  return { kind: 'rendered', view, status };
}

export function redirectTo(location: string): HandlerResult {
  return { kind: 'redirect', location };
}

export function toResponse(result: HandlerResult): Response {
  switch (result.kind) {
    case 'rendered':
      return new ResponseBuilder().status(result.status).html(result.view.content);
    case 'redirect':
      return new ResponseBuilder().redirect(result.location);
  }
}

/**
 * The login page, with `next` pointing back at the current path and query
 */
export function loginUrl(ctx: Context): string {
  const next = encodeURIComponent(ctx.url.pathname + ctx.url.search).replace(/%2F/g, '/');
  return `/auth/login/?next=${next}`;
}

export type ViewHandler = (ctx: Context, user: AuthUser | null) => Promise<HandlerResult> | HandlerResult;

/**
 * Adapt a view handler to a route handler
 */
export function respond(handler: ViewHandler): RouteHandler {
  return async (ctx) => {
    const user = getUser(ctx);
    try {
      return toResponse(await handler(ctx, user));
    } catch (error) {
      if (error instanceof NotFoundError) {
        return toResponse(rendered(notFoundPage(user, ctx.url.pathname), 404));
      }
      if (error instanceof AuthorizationError) {
        return toResponse(redirectTo(error.redirect ?? loginUrl(ctx)));
      }
      throw error;
    }
  };
}
