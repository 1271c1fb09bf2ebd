/**
 * Blog Routes
 *
 * Feeds, post pages, the post form, comments, follows and media.
 * Every mutation is gated by the access-control predicates over a session
 * built from the signed-in user.
 */

import type { Application } from '@framework/app.ts';
import type { Context, RouteHandler } from '@framework/http/types.ts';
import { readForm, type UploadedFile } from '@framework/http/request.ts';
import { ResponseBuilder, mimeTypeFor } from '@framework/http/response.ts';
import { getUser, type AuthUser } from '@framework/auth/auth.ts';
import { raw } from '@framework/view/html.ts';
import type { Cache } from '@framework/cache/cache.ts';
import type { Logger } from '@framework/telemetry/logger.ts';
import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from '../../../shared/application/errors.ts';
import {
  redirectTo,
  rendered,
  respond,
  toResponse,
  type HandlerResult,
  type ViewHandler,
} from '../../../shared/presentation/handler_result.ts';
import { notFoundPage } from '../../../shared/presentation/layout.ts';
import { ANONYMOUS, canCreate, canEdit, type Session } from '../domain/access_control.ts';
import type { AuthorDirectory, AuthorSummary } from '../domain/authors.ts';
import type { Post } from '../domain/post.ts';
import type { ContentStore } from '../application/content_store.ts';
import type { FeedComposer } from '../application/feed_composer.ts';
import type { FileStorage } from '../infrastructure/file_storage.ts';
import { feedSection, followFeedPage, groupFeedPage, siteFeedPage } from './views/feed.ts';
import { profilePage } from './views/profile.ts';
import { postDetailPage, type CommentView } from './views/post_detail.ts';
import { postFormPage, type PostFormValues } from './views/post_form.ts';

export interface BlogRouteServices {
  content: ContentStore;
  feeds: FeedComposer;
  authors: AuthorDirectory;
  storage: FileStorage;
  cache: Cache<string>;
  /** Lifetime of a cached site-feed page, in milliseconds */
  feedTtl: number;
  logger: Logger;
}

const INVALID_IMAGE = 'Upload a valid image. The file you uploaded was either not an image or a corrupted image.';

const GROUP_ID = /^\d+$/;

export function sessionFrom(user: AuthUser | null): Session {
  return user ? { userId: user.id } : ANONYMOUS;
}

export function feedCacheKey(page: number): string {
  return `index_page:${page}`;
}

/**
 * The group select's value as an id. Anything that is not a number maps
 * to 0, which no group has, so the store reports an invalid choice.
 */
function parseGroupId(value: string): number | null {
  if (value === '') return null;
  return GROUP_ID.test(value) ? Number(value) : 0;
}

function formValues(fields: Record<string, string>): PostFormValues {
  return { text: fields.text ?? '', group: fields.group ?? '' };
}

/**
 * Only signed-in users reach `handler`; everyone else goes to the login page
 */
function authoring(handler: (ctx: Context, user: AuthUser) => Promise<HandlerResult>): ViewHandler {
  return (ctx, user) => {
    if (user === null || !canCreate(sessionFrom(user))) {
      throw new AuthorizationError('Login required');
    }
    return handler(ctx, user);
  };
}

function requireEditor(user: AuthUser, post: Post): void {
  if (!canEdit(sessionFrom(user), post)) {
    throw new AuthorizationError('Only the author may change this post', `/posts/${post.id}/`);
  }
}

export function registerBlogRoutes(app: Application, services: BlogRouteServices): void {
  const { content, feeds, authors, storage, cache, logger } = services;

  async function requireAuthor(id: number): Promise<AuthorSummary> {
    const author = await authors.findSummary(id);
    if (!author) {
      throw new NotFoundError('User', id);
    }
    return author;
  }

  async function requireAuthorByName(username: string): Promise<AuthorSummary> {
    const author = await authors.findSummaryByUsername(username);
    if (!author) {
      throw new NotFoundError('User', username);
    }
    return author;
  }

  async function findPost(ctx: Context): Promise<Post> {
    return await content.getPost(Number(ctx.params.id));
  }

  async function renderPostForm(
    user: AuthUser,
    values: PostFormValues,
    errors: Record<string, string[]>,
    postId?: number
  ): Promise<HandlerResult> {
    const groups = await content.listGroups();
    return rendered(postFormPage({ user, groups, values, errors, postId }));
  }

  async function storeImage(file: UploadedFile | undefined): Promise<string | null> {
    return file ? await storage.save(file.name, file.bytes) : null;
  }

  // ==========================================================================
  // Feeds
  // ==========================================================================

  app.get(
    '/',
    respond(async (ctx, user) => {
      const page = await feeds.resolveSitePage(ctx.query.get('page'));
      const section = await cache.getOrSet(
        feedCacheKey(page),
        async () => feedSection(await feeds.siteFeed(page)).content,
        services.feedTtl
      );
      return rendered(siteFeedPage(user, raw(section)));
    }),
    { name: 'index' }
  );

  app.get(
    '/group/:slug/',
    respond(async (ctx, user) => {
      const { group, page } = await feeds.groupFeed(ctx.params.slug ?? '', ctx.query.get('page'));
      return rendered(groupFeedPage(user, group, page));
    }),
    { name: 'group_list' }
  );

  app.get(
    '/profile/:username/',
    respond(async (ctx, user) => {
      const feed = await feeds.profileFeed(ctx.params.username ?? '', ctx.query.get('page'));
      const following =
        user !== null && user.id !== feed.author.id ? await content.isFollowing(user.id, feed.author.id) : false;
      return rendered(profilePage({ ...feed, user, following }));
    }),
    { name: 'profile' }
  );

  app.get(
    '/follow/',
    respond(
      authoring(async (ctx, user) => rendered(followFeedPage(user, await feeds.followFeed(user.id, ctx.query.get('page')))))
    ),
    { name: 'follow_index' }
  );

  // ==========================================================================
  // Posts
  // ==========================================================================

  app.get(
    '/posts/:id(\\d+)/',
    respond(async (ctx, user) => {
      const post = await findPost(ctx);
      const author = await requireAuthor(post.authorId);
      const group = post.groupId !== null ? await content.findGroup(post.groupId) : null;

      const comments: CommentView[] = [];
      const commenters = new Map<number, AuthorSummary>([[author.id, author]]);
      for (const comment of await content.listComments(post.id)) {
        let commenter = commenters.get(comment.authorId);
        if (!commenter) {
          commenter = await requireAuthor(comment.authorId);
          commenters.set(commenter.id, commenter);
        }
        comments.push({ id: comment.id, text: comment.text, createdAt: comment.createdAt, author: commenter });
      }

      return rendered(
        postDetailPage({
          user,
          post,
          author,
          authorPostCount: await content.countPostsBy(author.id),
          group: group ? { slug: group.slug, title: group.title } : null,
          comments,
          canEdit: canEdit(sessionFrom(user), post),
        })
      );
    }),
    { name: 'post_detail' }
  );

  app.route(
    ['GET', 'POST'],
    '/create/',
    respond(
      authoring(async (ctx, user) => {
        if (ctx.method !== 'POST') {
          return await renderPostForm(user, { text: '', group: '' }, {});
        }

        const form = await readForm(ctx.request);
        const values = formValues(form.fields);
        const file = form.files.image;
        if (file && !file.type.startsWith('image/')) {
          return await renderPostForm(user, values, { image: [INVALID_IMAGE] });
        }

        const image = await storeImage(file);
        try {
          await content.createPost({
            authorId: user.id,
            text: values.text,
            groupId: parseGroupId(values.group),
            image,
          });
        } catch (error) {
          if (image !== null) {
            await storage.delete(image);
          }
          if (error instanceof ValidationError) {
            return await renderPostForm(user, values, error.fields);
          }
          throw error;
        }

        return redirectTo(`/profile/${user.username}/`);
      })
    ),
    { name: 'post_create' }
  );

  app.route(
    ['GET', 'POST'],
    '/posts/:id(\\d+)/edit/',
    respond(
      authoring(async (ctx, user) => {
        const post = await findPost(ctx);
        requireEditor(user, post);

        if (ctx.method !== 'POST') {
          const values = { text: post.text, group: post.groupId === null ? '' : String(post.groupId) };
          return await renderPostForm(user, values, {}, post.id);
        }

        const values = formValues((await readForm(ctx.request)).fields);
        try {
          await content.updatePost(post, { text: values.text, groupId: parseGroupId(values.group) });
        } catch (error) {
          if (error instanceof ValidationError) {
            return await renderPostForm(user, values, error.fields, post.id);
          }
          throw error;
        }

        return redirectTo(`/posts/${post.id}/`);
      })
    ),
    { name: 'post_edit' }
  );

  app.post(
    '/posts/:id(\\d+)/delete/',
    respond(
      authoring(async (ctx, user) => {
        const post = await findPost(ctx);
        requireEditor(user, post);
        await content.deletePost(post.id);
        return redirectTo(`/profile/${user.username}/`);
      })
    ),
    { name: 'post_delete' }
  );

  app.post(
    '/posts/:id(\\d+)/comment/',
    respond(
      authoring(async (ctx, user) => {
        const post = await findPost(ctx);
        const form = await readForm(ctx.request);
        try {
          await content.createComment(post, user.id, form.fields.text ?? '');
        } catch (error) {
          if (!(error instanceof ValidationError)) {
            throw error;
          }
          logger.debug('Empty comment ignored', { postId: post.id, userId: user.id });
        }
        return redirectTo(`/posts/${post.id}/`);
      })
    ),
    { name: 'add_comment' }
  );

  // ==========================================================================
  // Follows
  // ==========================================================================

  app.get(
    '/profile/:username/follow/',
    respond(
      authoring(async (ctx, user) => {
        const author = await requireAuthorByName(ctx.params.username ?? '');
        try {
          await content.follow(user.id, author.id);
        } catch (error) {
          if (!(error instanceof ConflictError)) {
            throw error;
          }
          logger.debug('Follow ignored', { userId: user.id, authorId: author.id, reason: error.message });
        }
        return redirectTo(`/profile/${author.username}/`);
      })
    ),
    { name: 'profile_follow' }
  );

  app.get(
    '/profile/:username/unfollow/',
    respond(
      authoring(async (ctx, user) => {
        const author = await requireAuthorByName(ctx.params.username ?? '');
        await content.unfollow(user.id, author.id);
        return redirectTo(`/profile/${author.username}/`);
      })
    ),
    { name: 'profile_unfollow' }
  );

  // ==========================================================================
  // Media
  // ==========================================================================

  const serveMedia: RouteHandler = async (ctx) => {
    const path = ctx.params.path ?? '';
    const bytes = await storage.read(path);
    if (!bytes) {
      return toResponse(rendered(notFoundPage(getUser(ctx), ctx.url.pathname), 404));
    }
    return new ResponseBuilder().header('Cache-Control', 'public, max-age=3600').bytes(bytes, mimeTypeFor(path));
  };

  app.get('/media/:path+', serveMedia, { name: 'media' });
}
