/**
 * Post Repository
 *
 * Posts live under `['posts', id]`. A post's comments live under
 * `['comments', postId, id]` so they can be dropped with it in one commit.
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { KVRepository } from '../../../shared/infrastructure/kv_repository.ts';
import { Post, type PostData } from '../domain/post.ts';

export class PostRepository extends KVRepository<Post, PostData> {
  constructor(kv: KVStore) {
    super(kv, 'posts');
  }

  /**
   * Posts matching `filter`, newest first; ties go to the higher id
   */
  async findNewest(filter?: (post: PostData) => boolean): Promise<Post[]> {
    let q = this.query().orderBy('createdAt', 'desc').orderBy('id', 'desc');
    if (filter) {
      q = q.filter(filter);
    }
    const data = await q.all();
    return data.map((item) => this.fromData(item));
  }

  async countByAuthor(authorId: number): Promise<number> {
    return await this.query().where('authorId', '=', authorId).count();
  }

  async count(): Promise<number> {
    return await this.query().count();
  }

  /**
   * Delete a post and all of its comments atomically
   */
  async deleteWithComments(id: number): Promise<void> {
    const comments = await this.kv.list(['comments', id]);
    const op = this.kv.atomic().delete(['posts', id]);
    for (const comment of comments) {
      op.delete(comment.key);
    }
    await op.commit();
  }

  protected toData(post: Post): PostData {
    return post.toData();
  }

  protected fromData(data: PostData): Post {
    return Post.fromData(data);
  }
}
