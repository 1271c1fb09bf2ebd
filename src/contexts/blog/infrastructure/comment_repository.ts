/**
 * Comment Repository
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { query } from '@framework/orm/query.ts';
import { Comment, type CommentData } from '../domain/comment.ts';

export class CommentRepository {
  constructor(private kv: KVStore) {}

  async nextId(): Promise<number> {
    return await this.kv.nextSequence('comments');
  }

  async save(comment: Comment): Promise<void> {
    await this.kv.set(['comments', comment.postId, comment.id], comment.toData());
  }

  /**
   * Comments on a post, oldest first
   */
  async listForPost(postId: number): Promise<Comment[]> {
    const data = await query<CommentData>(this.kv, ['comments', postId])
      .orderBy('createdAt')
      .orderBy('id')
      .all();
    return data.map((item) => Comment.fromData(item));
  }

  async countForPost(postId: number): Promise<number> {
    return await query<CommentData>(this.kv, ['comments', postId]).count();
  }
}
