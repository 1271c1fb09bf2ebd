/**
 * Service Wiring
 *
 * Builds the repositories and application services over one KV store.
 * Everything here lives for the whole process.
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { Cache } from '@framework/cache/cache.ts';
import type { Config } from '@framework/config/config.ts';
import type { Logger } from '@framework/telemetry/logger.ts';
import { UserRepository } from './contexts/accounts/infrastructure/user_repository.ts';
import { AccountService } from './contexts/accounts/application/account_service.ts';
import { GroupRepository } from './contexts/blog/infrastructure/group_repository.ts';
import { PostRepository } from './contexts/blog/infrastructure/post_repository.ts';
import { CommentRepository } from './contexts/blog/infrastructure/comment_repository.ts';
import { FollowRepository } from './contexts/blog/infrastructure/follow_repository.ts';
import type { FileStorage } from './contexts/blog/infrastructure/file_storage.ts';
import { ContentStore } from './contexts/blog/application/content_store.ts';
import { FeedComposer } from './contexts/blog/application/feed_composer.ts';

export interface ServiceDependencies {
  kv: KVStore;
  storage: FileStorage;
  config: Config;
  logger: Logger;
  /** Time source for cache expiry; defaults to `Date.now` */
  clock?: () => number;
}

export interface Services extends ServiceDependencies {
  /** Rendered site-feed sections */
  cache: Cache<string>;
  users: UserRepository;
  accounts: AccountService;
  content: ContentStore;
  feeds: FeedComposer;
}

export function createServices(deps: ServiceDependencies): Services {
  const { kv, logger } = deps;

  const users = new UserRepository(kv);
  const groups = new GroupRepository(kv);
  const posts = new PostRepository(kv);
  const comments = new CommentRepository(kv);
  const follows = new FollowRepository(kv);

  return {
    ...deps,
    cache: new Cache<string>({
      defaultTtl: deps.config.values.cache.feedTtl,
      maxSize: deps.config.values.cache.maxEntries,
      clock: deps.clock,
    }),
    users,
    accounts: new AccountService(users, logger.child({ context: 'accounts' })),
    content: new ContentStore({ groups, posts, comments, follows }, logger.child({ context: 'blog' })),
    feeds: new FeedComposer({ posts, groups, follows, authors: users }),
  };
}
