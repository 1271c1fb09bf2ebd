/**
 * Post detail page with comments
 */

import { html, each, when, linebreaks, type SafeHtml } from '@framework/view/html.ts';
import type { AuthUser } from '@framework/auth/auth.ts';
import { layout } from '../../../../shared/presentation/layout.ts';
import type { Post } from '../../domain/post.ts';
import type { AuthorSummary } from '../../domain/authors.ts';
import type { GroupSummary } from '../../application/feed_composer.ts';
import { formatDate, mediaUrl } from './post_card.ts';

export interface CommentView {
  id: number;
  text: string;
  createdAt: Date;
  author: AuthorSummary;
}

export interface PostDetailView {
  user: AuthUser | null;
  post: Post;
  author: AuthorSummary;
  authorPostCount: number;
  group: GroupSummary | null;
  comments: CommentView[];
  canEdit: boolean;
}

function commentForm(post: Post): SafeHtml {
  return html`
    <form method="post" action="/posts/${post.id}/comment/">
      <label for="id_text">Add a comment</label>
      <textarea name="text" id="id_text" rows="3" required></textarea>
      <button type="submit">Send</button>
    </form>`;
}

function commentItem(comment: CommentView): SafeHtml {
  return html`
    <li class="comment">
      <a href="/profile/${comment.author.username}/">${comment.author.displayName}</a>
      <span class="meta">${formatDate(comment.createdAt)}</span>
      <p>${linebreaks(comment.text)}</p>
    </li>`;
}

export function postDetailPage(view: PostDetailView): SafeHtml {
  const { post, author, group, comments, user } = view;

  return layout({
    title: `Post ${post.excerpt}`,
    user,
    content: html`
      <aside class="meta">
        <p>Published: ${formatDate(post.createdAt)}</p>
        ${when(
          group !== null,
          () => html`<p>Group: <a href="/group/${group?.slug ?? ''}/">${group?.title ?? ''}</a></p>`
        )}
        <p>Author: ${author.displayName}</p>
        <p>Posts by this author: <span class="post-count">${view.authorPostCount}</span></p>
        <p><a href="/profile/${author.username}/">all posts by this author</a></p>
      </aside>
      <article>
        ${when(post.image !== null, () => html`<img src="${mediaUrl(post.image ?? '')}" alt="" />`)}
        <p>${linebreaks(post.text)}</p>
        ${when(
          view.canEdit,
          () => html`
            <a class="button" href="/posts/${post.id}/edit/">Edit post</a>
            <form method="post" action="/posts/${post.id}/delete/">
              <button type="submit">Delete post</button>
            </form>`
        )}
      </article>
      <section class="comments">
        ${when(user !== null, () => commentForm(post))}
        <ul>${each(comments, commentItem)}</ul>
      </section>`,
  });
}
