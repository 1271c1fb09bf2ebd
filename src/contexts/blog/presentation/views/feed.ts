/**
 * Feed pages: site, group and follow feeds
 */

import { html, each, when, type SafeHtml } from '@framework/view/html.ts';
import type { Page } from '@framework/orm/paginator.ts';
import type { AuthUser } from '@framework/auth/auth.ts';
import { layout, pagination } from '../../../../shared/presentation/layout.ts';
import type { PostSummary } from '../../application/feed_composer.ts';
import type { Group } from '../../domain/group.ts';
import { postCard, type PostCardOptions } from './post_card.ts';

export const SITE_FEED_TITLE = 'Latest updates';

/**
 * The list of posts and page links, without the page around it
 */
export function feedSection(page: Page<PostSummary>, options: PostCardOptions = {}): SafeHtml {
  return html`
    <section class="feed">
      ${when(page.items.length === 0, () => html`<p class="empty">No posts yet.</p>`)}
      ${each(page.items, (summary) => postCard(summary, options))}
      ${pagination(page)}
    </section>`;
}

export function siteFeedPage(user: AuthUser | null, section: SafeHtml): SafeHtml {
  return layout({
    title: SITE_FEED_TITLE,
    user,
    content: html`<h1>${SITE_FEED_TITLE}</h1>${section}`,
  });
}

export function groupFeedTitle(group: Group): string {
  return `Posts of the ${group.title} community`;
}

export function groupFeedPage(user: AuthUser | null, group: Group, page: Page<PostSummary>): SafeHtml {
  const title = groupFeedTitle(group);
  return layout({
    title,
    user,
    content: html`
      <h1>${title}</h1>
      ${when(group.description !== '', () => html`<p class="description">${group.description}</p>`)}
      ${feedSection(page, { showGroup: false })}`,
  });
}

export function followFeedPage(user: AuthUser, page: Page<PostSummary>): SafeHtml {
  return layout({
    title: SITE_FEED_TITLE,
    user,
    content: html`
      <h1>${SITE_FEED_TITLE}</h1>
      <p class="meta">From the authors you follow</p>
      ${feedSection(page)}`,
  });
}
