/**
 * Follow Repository
 *
 * Follows live under `['follows', userId, authorId]`; the key itself keeps
 * each pair unique.
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { ConflictError } from '../../../shared/application/errors.ts';
import { Follow, type FollowData } from '../domain/follow.ts';

export class FollowRepository {
  constructor(private kv: KVStore) {}

  /**
   * Insert a follow. `ConflictError` when the pair already exists.
   */
  async insert(follow: Follow): Promise<void> {
    const key = ['follows', follow.userId, follow.authorId];
    const result = await this.kv
      .atomic()
      .check({ key, versionstamp: null })
      .set(key, follow.toData())
      .commit();

    if (!result.ok) {
      throw new ConflictError(`Already following author ${follow.authorId}`);
    }
  }

  async delete(userId: number, authorId: number): Promise<void> {
    await this.kv.delete(['follows', userId, authorId]);
  }

  async exists(userId: number, authorId: number): Promise<boolean> {
    return (await this.kv.get(['follows', userId, authorId])) !== null;
  }

  async find(userId: number, authorId: number): Promise<Follow | null> {
    const data = await this.kv.get<FollowData>(['follows', userId, authorId]);
    return data ? Follow.fromData(data) : null;
  }

  /**
   * Ids of the authors a user follows
   */
  async followedAuthorIds(userId: number): Promise<Set<number>> {
    const entries = await this.kv.list<FollowData>(['follows', userId]);
    return new Set(entries.map(({ value }) => value.authorId));
  }
}
