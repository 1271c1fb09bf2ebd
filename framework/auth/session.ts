/**
 * Session Management
 *
 * Server-side sessions stored in the KV store under `[prefix, id]` and
 * expiring after `maxAge`. The session id travels in a cookie.
 */

import { randomUUID } from 'node:crypto';
import type { KVStore } from '../orm/kv.ts';
import type { Context, Middleware } from '../http/types.ts';
import { getCookie } from '../http/request.ts';
import { serializeCookie } from '../http/response.ts';

export type SessionData = Record<string, unknown>;

export interface SessionOptions {
  name?: string;
  maxAge?: number; // in seconds
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
  path?: string;
  domain?: string;
  prefix?: string;
}

type ResolvedSessionOptions = Required<Omit<SessionOptions, 'domain'>> & Pick<SessionOptions, 'domain'>;

const DEFAULT_OPTIONS: ResolvedSessionOptions = {
  name: 'inkwell_session',
  maxAge: 86400 * 7, // 7 days
  secure: true,
  httpOnly: true,
  sameSite: 'Lax',
  path: '/',
  prefix: 'sessions',
};

/**
 * Session manager
 */
export class Session {
  private id: string;
  private data: SessionData = {};
  private isNew: boolean;
  private isModified = false;
  private options: ResolvedSessionOptions;

  constructor(
    private store: KVStore,
    id: string | null,
    options: SessionOptions = {}
  ) {
    this.id = id ?? randomUUID();
    this.isNew = id === null;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  getId(): string {
    return this.id;
  }

  getIsNew(): boolean {
    return this.isNew;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  set(key: string, value: unknown): void {
    this.data[key] = value;
    this.isModified = true;
  }

  delete(key: string): void {
    delete this.data[key];
    this.isModified = true;
  }

  has(key: string): boolean {
    return key in this.data;
  }

  clear(): void {
    this.data = {};
    this.isModified = true;
  }

  all(): SessionData {
    return { ...this.data };
  }

  /**
   * Load session data. An unknown or expired id starts a fresh session.
   */
  async load(): Promise<void> {
    const stored = await this.store.get<SessionData>([this.options.prefix, this.id]);

    if (stored) {
      this.data = stored;
      this.isNew = false;
    } else {
      this.id = randomUUID();
      this.isNew = true;
    }
  }

  /**
   * Persist the session. Untouched sessions are not written.
   */
  async save(): Promise<void> {
    if (!this.isModified) {
      return;
    }

    await this.store.set([this.options.prefix, this.id], this.data, {
      expireIn: this.options.maxAge * 1000,
    });

    this.isNew = false;
    this.isModified = false;
  }

  async destroy(): Promise<void> {
    await this.store.delete([this.options.prefix, this.id]);
    this.data = {};
    this.isNew = true;
    this.isModified = false;
  }

  /**
   * Move the session data to a fresh id (after login)
   */
  async regenerate(): Promise<void> {
    await this.store.delete([this.options.prefix, this.id]);
    this.id = randomUUID();
    this.isNew = true;
    this.isModified = true;
  }

  /**
   * Set-Cookie header value carrying the session id
   */
  toCookie(): string {
    return serializeCookie(this.options.name, this.id, {
      maxAge: this.options.maxAge,
      path: this.options.path,
      domain: this.options.domain,
      secure: this.options.secure,
      httpOnly: this.options.httpOnly,
      sameSite: this.options.sameSite,
    });
  }
}

/**
 * Get the session attached by the session middleware
 */
export function getSession(ctx: Context): Session | null {
  const session = ctx.state.get('session');
  return session instanceof Session ? session : null;
}

/**
 * Session middleware. Loads the session named by the cookie, saves it after
 * the handler, and sends a cookie whenever the stored id differs from the
 * one the client sent.
 */
export function createSessionMiddleware(store: KVStore, options: SessionOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async (ctx, next) => {
    const sessionId = getCookie(ctx, opts.name);
    const session = new Session(store, sessionId ?? null, opts);

    if (sessionId) {
      await session.load();
    }

    ctx.state.set('session', session);

    const response = await next();

    await session.save();

    if (session.getId() !== sessionId && !session.getIsNew()) {
      const headers = new Headers(response.headers);
      headers.append('Set-Cookie', session.toCookie());

      return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
      });
    }

    return response;
  };
}
