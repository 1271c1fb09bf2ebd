/**
 * Application Source
 *
 * Builds a ready-to-serve application from a set of services.
 */

import { Application } from '@framework/app.ts';
import { requestLoggingMiddleware } from '@framework/middleware/logging.ts';
import { createSessionMiddleware } from '@framework/auth/session.ts';
import { createAuthMiddleware } from '@framework/auth/auth.ts';
import { registerRoutes } from './routes/mod.ts';
import type { Services } from './services.ts';

export { createServices, type Services, type ServiceDependencies } from './services.ts';
export { registerRoutes } from './routes/mod.ts';

export function createBlogApp(services: Services): Application {
  const { config, logger, kv, accounts } = services;
  const app = new Application({ config, logger });

  // Order matters: auth reads the session the session middleware loads
  app.use(requestLoggingMiddleware(logger));
  app.use(
    createSessionMiddleware(kv, {
      maxAge: config.values.session.maxAge,
      secure: config.values.session.secure,
    })
  );
  app.use(createAuthMiddleware({ userLoader: (id) => accounts.loadUser(id) }));

  registerRoutes(app, services);
  return app;
}
