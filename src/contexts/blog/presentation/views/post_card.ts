/**
 * Post card, as shown in every feed
 */

import { html, when, linebreaks, type SafeHtml } from '@framework/view/html.ts';
import type { PostSummary } from '../../application/feed_composer.ts';

export interface PostCardOptions {
  /** Link to the post's group, when it has one */
  showGroup?: boolean;
  /** Link to the author's profile */
  showAuthor?: boolean;
}

export function formatDate(date: Date): string {
  return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric' });
}

export function mediaUrl(path: string): string {
  return `/media/${path}`;
}

export function postCard({ post, author, group }: PostSummary, options: PostCardOptions = {}): SafeHtml {
  const { showGroup = true, showAuthor = true } = options;

  return html`
    <article data-post-id="${post.id}">
      <ul class="meta">
        <li>
          Author: ${author.displayName}
          ${when(showAuthor, () => html`<a href="/profile/${author.username}/">all posts by this author</a>`)}
        </li>
        <li>Published: ${formatDate(post.createdAt)}</li>
      </ul>
      ${when(post.image !== null, () => html`<img src="${mediaUrl(post.image ?? '')}" alt="" />`)}
      <p>${linebreaks(post.text)}</p>
      <a href="/posts/${post.id}/">details</a>
      ${when(
        showGroup && group !== null,
        () => html`<br /><a href="/group/${group?.slug ?? ''}/">all posts of the group “${group?.title ?? ''}”</a>`
      )}
    </article>`;
}
