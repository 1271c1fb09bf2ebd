/**
 * Follow Relation
 *
 * A directed (follower, author) pair. It has no identity beyond the pair
 * and is never updated.
 */

import { ConflictError } from '../../../shared/application/errors.ts';

export interface FollowData {
  userId: number;
  authorId: number;
  createdAt: string;
}

export class Follow {
  private constructor(
    readonly userId: number,
    readonly authorId: number,
    readonly createdAt: Date
  ) {}

  /**
   * `ConflictError` when a user tries to follow themselves
   */
  static create(userId: number, authorId: number): Follow {
    if (userId === authorId) {
      throw new ConflictError('Users cannot follow themselves');
    }
    return new Follow(userId, authorId, new Date());
  }

  static fromData(data: FollowData): Follow {
    return new Follow(data.userId, data.authorId, new Date(data.createdAt));
  }

  toData(): FollowData {
    return { userId: this.userId, authorId: this.authorId, createdAt: this.createdAt.toISOString() };
  }
}
