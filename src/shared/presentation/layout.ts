/**
 * Page Layout
 *
 * The document shell and navigation shared by every page, plus small
 * partials used across contexts.
 */

import { html, when, each, type SafeHtml } from '@framework/view/html.ts';
import type { AuthUser } from '@framework/auth/auth.ts';
import type { Page } from '@framework/orm/paginator.ts';

export const SITE_NAME = 'Inkwell';

export interface LayoutOptions {
  title: string;
  user: AuthUser | null;
  content: SafeHtml;
}

function nav(user: AuthUser | null): SafeHtml {
  return html`
    <nav class="nav">
      <a class="brand" href="/">${SITE_NAME}</a>
      <ul>
        <li><a href="/">Home</a></li>
        ${when(
          user !== null,
          () => html`
            <li><a href="/follow/">Following</a></li>
            <li><a href="/create/">New post</a></li>
            <li><a href="/profile/${user?.username ?? ''}/">${user?.username ?? ''}</a></li>
            <li><a href="/auth/logout/">Log out</a></li>
          `,
          () => html`
            <li><a href="/auth/login/">Log in</a></li>
            <li><a href="/auth/signup/">Sign up</a></li>
          `
        )}
      </ul>
    </nav>`;
}

/**
 * Full HTML document
 */
export function layout({ title, user, content }: LayoutOptions): SafeHtml {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${title} | ${SITE_NAME}</title>
    <style>
      body { font-family: system-ui, -apple-system, sans-serif; max-width: 48rem; margin: 0 auto; padding: 0 1rem; color: #222; }
      .nav { display: flex; justify-content: space-between; align-items: center; padding: 1rem 0; border-bottom: 1px solid #ddd; }
      .nav ul { display: flex; gap: 1rem; list-style: none; margin: 0; padding: 0; }
      .brand { font-weight: 700; font-size: 1.25rem; }
      a { color: #2a5db0; text-decoration: none; }
      article { padding: 1rem 0; border-bottom: 1px solid #eee; }
      .meta { color: #666; font-size: 0.875rem; }
      .errors { color: #b00020; }
      .pagination { display: flex; gap: 0.5rem; padding: 1rem 0; list-style: none; }
      img { max-width: 100%; }
    </style>
  </head>
  <body>
    ${nav(user)}
    <main>
      ${content}
    </main>
  </body>
</html>`;
}

/**
 * Page links for a paginated list
 */
export function pagination<T>(page: Page<T>): SafeHtml {
  if (page.totalPages <= 1) {
    return html``;
  }

  const numbers = Array.from({ length: page.totalPages }, (_, i) => i + 1);

  return html`
    <ul class="pagination">
      ${when(page.hasPrevious, () => html`<li><a href="?page=1">First</a></li><li><a href="?page=${page.number - 1}">Previous</a></li>`)}
      ${each(numbers, (n) =>
        n === page.number ? html`<li><strong>${n}</strong></li>` : html`<li><a href="?page=${n}">${n}</a></li>`
      )}
      ${when(page.hasNext, () => html`<li><a href="?page=${page.number + 1}">Next</a></li><li><a href="?page=${page.totalPages}">Last</a></li>`)}
    </ul>`;
}

/**
 * Inline messages for one form field
 */
export function fieldErrors(errors: Record<string, string[]>, field: string): SafeHtml {
  const messages = errors[field] ?? [];
  if (messages.length === 0) {
    return html``;
  }
  return html`<ul class="errors">${each(messages, (message) => html`<li>${message}</li>`)}</ul>`;
}

export function notFoundPage(user: AuthUser | null, path: string): SafeHtml {
  return layout({
    title: 'Page not found',
    user,
    content: html`
      <h1>Page not found</h1>
      <p>Nothing lives at <code>${path}</code>.</p>
      <p><a href="/">Back to the latest posts</a></p>`,
  });
}

export function serverErrorPage(user: AuthUser | null): SafeHtml {
  return layout({
    title: 'Server error',
    user,
    content: html`
      <h1>Something went wrong</h1>
      <p>The error has been logged. Please try again later.</p>`,
  });
}
