/**
 * Feed Composer
 *
 * Paginated post feeds: the whole site, one group, one author, and the
 * authors a user follows. Every feed is newest first, ties broken by the
 * higher id.
 */

import { Paginator, pageCount, resolvePageNumber, type Page } from '@framework/orm/paginator.ts';
import { NotFoundError } from '../../../shared/application/errors.ts';
import type { Post, PostData } from '../domain/post.ts';
import type { Group } from '../domain/group.ts';
import type { AuthorDirectory, AuthorSummary } from '../domain/authors.ts';
import type { GroupRepository } from '../infrastructure/group_repository.ts';
import type { PostRepository } from '../infrastructure/post_repository.ts';
import type { FollowRepository } from '../infrastructure/follow_repository.ts';

export const PAGE_SIZE = 10;

export type PageNumber = string | number | null | undefined;

export interface GroupSummary {
  slug: string;
  title: string;
}

/**
 * A post with what a feed shows next to it
 */
export interface PostSummary {
  post: Post;
  author: AuthorSummary;
  group: GroupSummary | null;
}

export interface GroupFeed {
  group: Group;
  page: Page<PostSummary>;
}

export interface ProfileFeed {
  author: AuthorSummary;
  postCount: number;
  page: Page<PostSummary>;
}

export interface FeedSources {
  posts: PostRepository;
  groups: GroupRepository;
  follows: FollowRepository;
  authors: AuthorDirectory;
}

const UNKNOWN_AUTHOR = (id: number): AuthorSummary => ({ id, username: '', displayName: 'unknown' });

export class FeedComposer {
  constructor(
    private sources: FeedSources,
    private pageSize: number = PAGE_SIZE
  ) {}

  async siteFeed(page: PageNumber): Promise<Page<PostSummary>> {
    return await this.compose(page);
  }

  /**
   * The page number `siteFeed` would serve for `page`, without loading posts
   */
  async resolveSitePage(page: PageNumber): Promise<number> {
    const total = await this.sources.posts.count();
    return resolvePageNumber(page, pageCount(total, this.pageSize));
  }

  /**
   * `NotFoundError` for an unknown slug
   */
  async groupFeed(slug: string, page: PageNumber): Promise<GroupFeed> {
    const group = await this.sources.groups.findBySlug(slug);
    if (!group) {
      throw new NotFoundError('Group', slug);
    }
    return { group, page: await this.compose(page, (post) => post.groupId === group.id) };
  }

  /**
   * `NotFoundError` for an unknown username
   */
  async profileFeed(username: string, page: PageNumber): Promise<ProfileFeed> {
    const author = await this.sources.authors.findSummaryByUsername(username);
    if (!author) {
      throw new NotFoundError('User', username);
    }
    const feed = await this.compose(page, (post) => post.authorId === author.id);
    return { author, postCount: feed.total, page: feed };
  }

  /**
   * Posts by the authors `userId` follows. Empty when they follow no one.
   */
  async followFeed(userId: number, page: PageNumber): Promise<Page<PostSummary>> {
    const followed = await this.sources.follows.followedAuthorIds(userId);
    return await this.compose(page, (post) => followed.has(post.authorId));
  }

  private async compose(page: PageNumber, filter?: (post: PostData) => boolean): Promise<Page<PostSummary>> {
    const posts = await this.sources.posts.findNewest(filter);
    const selected = new Paginator(posts, this.pageSize).getPage(page);
    return { ...selected, items: await this.summarize(selected.items) };
  }

  /**
   * Attach authors and groups, looking each one up once
   */
  private async summarize(posts: Post[]): Promise<PostSummary[]> {
    const authors = new Map<number, AuthorSummary>();
    const groups = new Map<number, GroupSummary | null>();

    const summaries: PostSummary[] = [];
    for (const post of posts) {
      let author = authors.get(post.authorId);
      if (!author) {
        author = (await this.sources.authors.findSummary(post.authorId)) ?? UNKNOWN_AUTHOR(post.authorId);
        authors.set(post.authorId, author);
      }

      let group: GroupSummary | null = null;
      if (post.groupId !== null) {
        const cached = groups.get(post.groupId);
        if (cached !== undefined) {
          group = cached;
        } else {
          const found = await this.sources.groups.findById(post.groupId);
          group = found ? { slug: found.slug, title: found.title } : null;
          groups.set(post.groupId, group);
        }
      }

      summaries.push({ post, author, group });
    }
    return summaries;
  }
}
