/**
 * Author profile page
 */

import { html, when, type SafeHtml } from '@framework/view/html.ts';
import type { AuthUser } from '@framework/auth/auth.ts';
import { layout } from '../../../../shared/presentation/layout.ts';
import type { ProfileFeed } from '../../application/feed_composer.ts';
import { feedSection } from './feed.ts';

export interface ProfileView extends ProfileFeed {
  user: AuthUser | null;
  following: boolean;
}

function followButton({ user, author, following }: ProfileView): SafeHtml {
  if (!user || user.id === author.id) {
    return html``;
  }
  return following
    ? html`<a class="button" href="/profile/${author.username}/unfollow/">Unfollow</a>`
    : html`<a class="button" href="/profile/${author.username}/follow/">Follow</a>`;
}

export function profilePage(view: ProfileView): SafeHtml {
  const { author, postCount, page, user } = view;

  return layout({
    title: `Profile of ${author.displayName}`,
    user,
    content: html`
      <h1>All posts by ${author.displayName}</h1>
      <h3>Posts: <span class="post-count">${postCount}</span></h3>
      ${when(user !== null, () => followButton(view))}
      ${feedSection(page, { showAuthor: false })}`,
  });
}
