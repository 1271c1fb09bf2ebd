/**
 * Content Store
 *
 * Creates and changes groups, posts, comments and follows. Callers have
 * already applied the access-control checks; the store only enforces the
 * data invariants.
 */

import type { Logger } from '@framework/telemetry/logger.ts';
import { NotFoundError, ValidationError } from '../../../shared/application/errors.ts';
import { Group } from '../domain/group.ts';
import { Post } from '../domain/post.ts';
import { Comment } from '../domain/comment.ts';
import { Follow } from '../domain/follow.ts';
import type { GroupRepository } from '../infrastructure/group_repository.ts';
import type { PostRepository } from '../infrastructure/post_repository.ts';
import type { CommentRepository } from '../infrastructure/comment_repository.ts';
import type { FollowRepository } from '../infrastructure/follow_repository.ts';

export interface ContentRepositories {
  groups: GroupRepository;
  posts: PostRepository;
  comments: CommentRepository;
  follows: FollowRepository;
}

export interface CreatePostInput {
  authorId: number;
  text: string;
  groupId?: number | null;
  image?: string | null;
}

export interface UpdatePostInput {
  text: string;
  groupId?: number | null;
}

export class ContentStore {
  private groups: GroupRepository;
  private posts: PostRepository;
  private comments: CommentRepository;
  private follows: FollowRepository;

  constructor(repositories: ContentRepositories, private logger: Logger) {
    this.groups = repositories.groups;
    this.posts = repositories.posts;
    this.comments = repositories.comments;
    this.follows = repositories.follows;
  }

  // ==========================================================================
  // Posts
  // ==========================================================================

  async createPost(input: CreatePostInput): Promise<Post> {
    const groupId = await this.validatePost(input.text, input.groupId);

    const post = Post.create({
      id: await this.posts.nextId(),
      authorId: input.authorId,
      text: input.text,
      groupId,
      image: input.image,
    });

    await this.posts.save(post);
    this.logger.info('Post created', { postId: post.id, authorId: post.authorId });
    return post;
  }

  /**
   * Replace a post's text and group. Image, author and creation time stay.
   */
  async updatePost(post: Post, input: UpdatePostInput): Promise<Post> {
    const groupId = await this.validatePost(input.text, input.groupId);
    post.edit({ text: input.text, groupId });
    await this.posts.save(post);
    this.logger.info('Post updated', { postId: post.id });
    return post;
  }

  /**
   * Delete a post and its comments. A missing post is not an error.
   */
  async deletePost(postId: number): Promise<void> {
    await this.posts.deleteWithComments(postId);
    this.logger.info('Post deleted', { postId });
  }

  async getPost(id: number): Promise<Post> {
    const post = await this.posts.findById(id);
    if (!post) {
      throw new NotFoundError('Post', id);
    }
    return post;
  }

  async countPosts(): Promise<number> {
    return await this.posts.count();
  }

  async countPostsBy(authorId: number): Promise<number> {
    return await this.posts.countByAuthor(authorId);
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  async createComment(post: Post, authorId: number, text: string): Promise<Comment> {
    const comment = Comment.create({
      id: await this.comments.nextId(),
      postId: post.id,
      authorId,
      text,
    });
    await this.comments.save(comment);
    this.logger.debug('Comment created', { postId: post.id, commentId: comment.id });
    return comment;
  }

  async listComments(postId: number): Promise<Comment[]> {
    return await this.comments.listForPost(postId);
  }

  // ==========================================================================
  // Follows
  // ==========================================================================

  /**
   * `ConflictError` for a self-follow or an existing pair
   */
  async follow(userId: number, authorId: number): Promise<Follow> {
    const follow = Follow.create(userId, authorId);
    await this.follows.insert(follow);
    this.logger.debug('Follow created', { userId, authorId });
    return follow;
  }

  async unfollow(userId: number, authorId: number): Promise<void> {
    await this.follows.delete(userId, authorId);
  }

  async isFollowing(userId: number, authorId: number): Promise<boolean> {
    return await this.follows.exists(userId, authorId);
  }

  // ==========================================================================
  // Groups
  // ==========================================================================

  async getGroupBySlug(slug: string): Promise<Group> {
    const group = await this.groups.findBySlug(slug);
    if (!group) {
      throw new NotFoundError('Group', slug);
    }
    return group;
  }

  async findGroup(id: number): Promise<Group | null> {
    return await this.groups.findById(id);
  }

  async listGroups(): Promise<Group[]> {
    return await this.groups.listByTitle();
  }

  /**
   * `ValidationError` for a bad title or slug, `ConflictError` for a taken slug
   */
  async createGroup(input: { title: string; slug: string; description?: string }): Promise<Group> {
    const group = Group.create({ id: await this.groups.nextId(), ...input });
    await this.groups.insert(group);
    this.logger.info('Group created', { groupId: group.id, slug: group.slug });
    return group;
  }

  /**
   * Check text and group together so both errors are reported at once
   */
  private async validatePost(text: string, groupId: number | null | undefined): Promise<number | null> {
    const fields: Record<string, string[]> = {};

    if (text.trim().length === 0) {
      fields.text = ['This field is required.'];
    }
    if (groupId !== null && groupId !== undefined && !(await this.groups.exists(groupId))) {
      fields.group = ['Select a valid choice. That choice is not one of the available choices.'];
    }

    if (Object.keys(fields).length > 0) {
      throw new ValidationError(fields);
    }
    return groupId ?? null;
  }
}
