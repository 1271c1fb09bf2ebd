/**
 * Response Builder
 *
 * Fluent interface for building HTML, text and redirect responses with
 * cookies attached.
 */

import type { CookieOptions } from './types.ts';

export interface ResponseOptions {
  status?: number;
  headers?: Record<string, string>;
}

/**
 * Serialize a cookie for a Set-Cookie header
 */
export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  const parts = [`${encodeURIComponent(name)}=${encodeURIComponent(value)}`];

  if (options.maxAge !== undefined) {
    parts.push(`Max-Age=${options.maxAge}`);
  }
  if (options.expires) {
    parts.push(`Expires=${options.expires.toUTCString()}`);
  }
  if (options.path) {
    parts.push(`Path=${options.path}`);
  }
  if (options.domain) {
    parts.push(`Domain=${options.domain}`);
  }
  if (options.secure) {
    parts.push('Secure');
  }
  if (options.httpOnly) {
    parts.push('HttpOnly');
  }
  if (options.sameSite) {
    parts.push(`SameSite=${options.sameSite}`);
  }

  return parts.join('; ');
}

/**
 * Response builder
 */
export class ResponseBuilder {
  private _status = 200;
  private _headers = new Headers();
  private _body: string | Uint8Array | null = null;
  private _cookies: string[] = [];

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    for (const [key, value] of Object.entries(options?.headers ?? {})) {
      this._headers.set(key, value);
    }
  }

  status(code: number): this {
    this._status = code;
    return this;
  }

  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  cookie(name: string, value: string, options: CookieOptions = {}): this {
    this._cookies.push(serializeCookie(name, value, options));
    return this;
  }

  clearCookie(name: string, options: CookieOptions = {}): this {
    return this.cookie(name, '', { ...options, maxAge: 0, expires: new Date(0) });
  }

  html(content: string): Response {
    this._headers.set('Content-Type', 'text/html; charset=utf-8');
    this._body = content;
    return this.build();
  }

  text(content: string): Response {
    this._headers.set('Content-Type', 'text/plain; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send raw bytes with the given content type
   */
  bytes(content: Uint8Array, contentType: string): Response {
    this._headers.set('Content-Type', contentType);
    this._body = content;
    return this.build();
  }

  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    this._status = status;
    this._headers.set('Location', url);
    this._body = null;
    return this.build();
  }

  notFound(message = 'Not Found'): Response {
    this._status = 404;
    return this.text(message);
  }

  build(): Response {
    const headers = new Headers(this._headers);
    for (const cookie of this._cookies) {
      headers.append('Set-Cookie', cookie);
    }
    return new Response(this._body, { status: this._status, headers });
  }
}

/**
 * Content types for files served from storage
 */
export const MIME_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
};

export function mimeTypeFor(path: string): string {
  const ext = path.split('.').pop()?.toLowerCase() ?? '';
  return MIME_TYPES[ext] ?? 'application/octet-stream';
}
