/**
 * Authentication Manager
 *
 * Keeps the signed-in user's id in the session and loads the user for
 * each request.
 */

import type { Context, Middleware } from '../http/types.ts';
import { getSession, type Session } from './session.ts';
import { verifyPassword } from './password.ts';

export interface AuthUser {
  id: number;
  username: string;
  displayName: string;
}

export interface AuthOptions {
  sessionKey?: string;
  userLoader?: (id: number) => Promise<AuthUser | null>;
  passwordVerifier?: (password: string, hash: string) => Promise<boolean>;
}

/**
 * Credentials looked up by `Auth.authenticate`
 */
export interface StoredCredentials {
  id: number;
  passwordHash: string;
}

/**
 * Authentication manager
 */
export class Auth {
  private sessionKey: string;
  private userLoader?: (id: number) => Promise<AuthUser | null>;
  private passwordVerifier: (password: string, hash: string) => Promise<boolean>;
  private currentUser: AuthUser | null = null;

  constructor(private session: Session, options: AuthOptions = {}) {
    this.sessionKey = options.sessionKey ?? 'auth_user_id';
    this.userLoader = options.userLoader;
    this.passwordVerifier = options.passwordVerifier ?? verifyPassword;
  }

  get user(): AuthUser | null {
    return this.currentUser;
  }

  get isAuthenticated(): boolean {
    return this.currentUser !== null;
  }

  /**
   * Load the user whose id is stored in the session
   */
  async loadFromSession(): Promise<AuthUser | null> {
    const userId = this.session.get(this.sessionKey);

    if (typeof userId !== 'number' || !this.userLoader) {
      return null;
    }

    this.currentUser = await this.userLoader(userId);
    if (!this.currentUser) {
      // The user is gone; forget the stale id
      this.session.delete(this.sessionKey);
    }

    return this.currentUser;
  }

  /**
   * Check credentials and sign the user in on success
   */
  async authenticate(
    identifier: string,
    password: string,
    findUser: (identifier: string) => Promise<StoredCredentials | null>
  ): Promise<AuthUser | null> {
    const stored = await findUser(identifier);
    if (!stored) {
      return null;
    }

    const isValid = await this.passwordVerifier(password, stored.passwordHash);
    if (!isValid || !this.userLoader) {
      return null;
    }

    const user = await this.userLoader(stored.id);
    if (user) {
      await this.login(user);
    }

    return user;
  }

  /**
   * Sign a user in. The session gets a fresh id.
   */
  async login(user: AuthUser): Promise<void> {
    await this.session.regenerate();
    this.currentUser = user;
    this.session.set(this.sessionKey, user.id);
  }

  async logout(): Promise<void> {
    this.currentUser = null;
    this.session.delete(this.sessionKey);
  }
}

/**
 * Get the Auth instance attached by the auth middleware
 */
export function getAuth(ctx: Context): Auth | null {
  const auth = ctx.state.get('auth');
  return auth instanceof Auth ? auth : null;
}

/**
 * Get the signed-in user, if any
 */
export function getUser(ctx: Context): AuthUser | null {
  return getAuth(ctx)?.user ?? null;
}

/**
 * Auth middleware. Requires the session middleware to run first; puts
 * `auth` and `user` into `ctx.state`.
 */
export function createAuthMiddleware(options: AuthOptions = {}): Middleware {
  return async (ctx, next) => {
    const session = getSession(ctx);

    if (session) {
      const auth = new Auth(session, options);
      await auth.loadFromSession();
      ctx.state.set('auth', auth);
      ctx.state.set('user', auth.user);
    }

    return await next();
  };
}
