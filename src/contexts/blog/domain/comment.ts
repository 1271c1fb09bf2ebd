/**
 * Comment Entity
 */

import { Entity, toDate } from '../../../shared/domain/entity.ts';
import { requireText } from './post.ts';

export interface CommentData {
  id: number;
  postId: number;
  authorId: number;
  text: string;
  createdAt: string;
}

export class Comment extends Entity<number> {
  private constructor(
    id: number,
    readonly postId: number,
    readonly authorId: number,
    readonly text: string,
    createdAt: Date
  ) {
    super(id, createdAt);
  }

  static create(params: { id: number; postId: number; authorId: number; text: string; createdAt?: Date }): Comment {
    return new Comment(
      params.id,
      params.postId,
      params.authorId,
      requireText(params.text),
      params.createdAt ?? new Date()
    );
  }

  static fromData(data: CommentData): Comment {
    return new Comment(data.id, data.postId, data.authorId, data.text, toDate(data.createdAt));
  }

  toData(): CommentData {
    return {
      id: this.id,
      postId: this.postId,
      authorId: this.authorId,
      text: this.text,
      createdAt: this.createdAt.toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return { ...this.toData() };
  }
}
