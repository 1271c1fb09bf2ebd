/**
 * Account Routes
 *
 * Sign-up, login and logout.
 */

import type { Application } from '@framework/app.ts';
import type { Context } from '@framework/http/types.ts';
import { readForm } from '@framework/http/request.ts';
import { getAuth, type Auth } from '@framework/auth/auth.ts';
import { getSession } from '@framework/auth/session.ts';
import type { Logger } from '@framework/telemetry/logger.ts';
import { ValidationError } from '../../../shared/application/errors.ts';
import { redirectTo, rendered, respond } from '../../../shared/presentation/handler_result.ts';
import type { AccountService } from '../application/account_service.ts';
import { EMPTY_SIGNUP, loggedOutPage, loginPage, signupPage, type SignupValues } from './views/account_pages.ts';

export interface AccountRouteServices {
  accounts: AccountService;
  logger: Logger;
}

export const INVALID_LOGIN =
  'Please enter a correct username and password. Note that both fields may be case-sensitive.';

const LOCAL_ORIGIN = 'http://local.invalid';

// Browsers drop tabs and newlines from URLs, so `/\t/host` would become `//host`
const UNSAFE_CHARACTERS = /[\s\u0000-\u001f\u007f]/;

/**
 * A redirect target is honoured only when it is a path that resolves to
 * this site
 */
export function safeNext(next: string | null | undefined): string {
  if (!next || !next.startsWith('/') || UNSAFE_CHARACTERS.test(next)) {
    return '/';
  }
  return new URL(next, LOCAL_ORIGIN).origin === LOCAL_ORIGIN ? next : '/';
}

function requireAuth(ctx: Context): Auth {
  const auth = getAuth(ctx);
  if (!auth) {
    throw new Error('Auth middleware is not installed');
  }
  return auth;
}

function signupValues(fields: Record<string, string>): SignupValues {
  return {
    first_name: fields.first_name ?? '',
    last_name: fields.last_name ?? '',
    username: fields.username ?? '',
    email: fields.email ?? '',
  };
}

export function registerAccountRoutes(app: Application, services: AccountRouteServices): void {
  const { accounts, logger } = services;

  app.route(
    ['GET', 'POST'],
    '/auth/signup/',
    respond(async (ctx, user) => {
      if (ctx.method !== 'POST') {
        return rendered(signupPage(user, EMPTY_SIGNUP, {}));
      }

      const { fields } = await readForm(ctx.request);
      try {
        await accounts.signup(fields);
      } catch (error) {
        if (error instanceof ValidationError) {
          return rendered(signupPage(user, signupValues(fields), error.fields));
        }
        throw error;
      }
      return redirectTo('/');
    }),
    { name: 'signup' }
  );

  app.route(
    ['GET', 'POST'],
    '/auth/login/',
    respond(async (ctx, user) => {
      if (ctx.method !== 'POST') {
        return rendered(loginPage(user, '', ctx.query.get('next') ?? ''));
      }

      const { fields } = await readForm(ctx.request);
      const username = fields.username ?? '';
      const next = fields.next ?? ctx.query.get('next') ?? '';

      const signedIn = await requireAuth(ctx).authenticate(username, fields.password ?? '', (name) =>
        accounts.findCredentials(name)
      );
      if (!signedIn) {
        logger.info('Login failed', { username });
        return rendered(loginPage(null, username, next, INVALID_LOGIN));
      }

      logger.info('User logged in', { userId: signedIn.id });
      return redirectTo(safeNext(next));
    }),
    { name: 'login' }
  );

  app.get(
    '/auth/logout/',
    respond(async (ctx) => {
      const auth = getAuth(ctx);
      if (auth?.user) {
        logger.info('User logged out', { userId: auth.user.id });
      }
      await auth?.logout();
      await getSession(ctx)?.destroy();
      return rendered(loggedOutPage());
    }),
    { name: 'logout' }
  );
}
