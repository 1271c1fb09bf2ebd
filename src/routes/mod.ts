/**
 * Application Routes
 *
 * Registers every context's routes plus the 404 and 500 pages.
 */

import type { Application } from '@framework/app.ts';
import { getUser } from '@framework/auth/auth.ts';
import { registerAccountRoutes } from '../contexts/accounts/presentation/account_routes.ts';
import { registerBlogRoutes } from '../contexts/blog/presentation/post_routes.ts';
import { notFoundPage, serverErrorPage } from '../shared/presentation/layout.ts';
import { rendered, toResponse } from '../shared/presentation/handler_result.ts';
import type { Services } from '../services.ts';

export function registerRoutes(app: Application, services: Services): void {
  registerAccountRoutes(app, services);

  registerBlogRoutes(app, {
    content: services.content,
    feeds: services.feeds,
    authors: services.users,
    storage: services.storage,
    cache: services.cache,
    feedTtl: services.config.values.cache.feedTtl,
    logger: services.logger.child({ context: 'blog' }),
  });

  app.setNotFound((ctx) => toResponse(rendered(notFoundPage(getUser(ctx), ctx.url.pathname), 404)));
  app.setErrorHandler((ctx) => toResponse(rendered(serverErrorPage(getUser(ctx)), 500)));
}
