/**
 * Request Helpers
 *
 * Utilities for reading cookies and form fields off a Fetch `Request`.
 */

import type { Context } from './types.ts';

/**
 * Parse a Cookie header into a name/value map
 */
export function parseCookies(header: string | null): Map<string, string> {
  const cookies = new Map<string, string>();

  for (const cookie of (header ?? '').split(';')) {
    const [name, ...rest] = cookie.split('=');
    if (name && name.trim()) {
      const value = rest.join('=').trim();
      try {
        cookies.set(name.trim(), decodeURIComponent(value));
      } catch {
        cookies.set(name.trim(), value);
      }
    }
  }

  return cookies;
}

/**
 * Read a cookie from the request in context
 */
export function getCookie(ctx: Context, name: string): string | undefined {
  return parseCookies(ctx.request.headers.get('Cookie')).get(name);
}

/**
 * A file field from a multipart form
 */
export interface UploadedFile {
  name: string;
  type: string;
  bytes: Uint8Array;
}

/**
 * Parsed form body. Text fields and files are kept apart.
 */
export interface FormBody {
  fields: Record<string, string>;
  files: Record<string, UploadedFile>;
}

/**
 * Parse an urlencoded or multipart body. Empty file inputs are dropped.
 */
export async function readForm(request: Request): Promise<FormBody> {
  const body: FormBody = { fields: {}, files: {} };
  const contentType = request.headers.get('Content-Type') ?? '';

  if (
    !contentType.includes('application/x-www-form-urlencoded') &&
    !contentType.includes('multipart/form-data')
  ) {
    return body;
  }

  const form = await request.formData();
  for (const [name, value] of form.entries()) {
    if (typeof value === 'string') {
      body.fields[name] = value;
    } else if (value.name !== '' && value.size > 0) {
      body.files[name] = {
        name: value.name,
        type: value.type,
        bytes: new Uint8Array(await value.arrayBuffer()),
      };
    }
  }

  return body;
}
