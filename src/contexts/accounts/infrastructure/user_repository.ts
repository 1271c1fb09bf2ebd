/**
 * User Repository
 *
 * Users live under `['users', id]` with a unique username index at
 * `['users_by_username', username]`.
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { KVRepository } from '../../../shared/infrastructure/kv_repository.ts';
import { ConflictError } from '../../../shared/application/errors.ts';
import { User, type UserData, type UserSummary } from '../domain/user.ts';

export class UserRepository extends KVRepository<User, UserData> {
  constructor(kv: KVStore) {
    super(kv, 'users');
  }

  async findByUsername(username: string): Promise<User | null> {
    const id = await this.kv.get<number>(['users_by_username', username]);
    return id === null ? null : await this.findById(id);
  }

  async findSummary(id: number): Promise<UserSummary | null> {
    return (await this.findById(id))?.toSummary() ?? null;
  }

  async findSummaryByUsername(username: string): Promise<UserSummary | null> {
    return (await this.findByUsername(username))?.toSummary() ?? null;
  }

  /**
   * Insert a new user. `ConflictError` when the username is taken.
   */
  async insert(user: User): Promise<void> {
    const indexKey = ['users_by_username', user.username];
    const result = await this.kv
      .atomic()
      .check({ key: indexKey, versionstamp: null })
      .set(['users', user.id], this.toData(user))
      .set(indexKey, user.id)
      .commit();

    if (!result.ok) {
      throw new ConflictError(`Username already taken: ${user.username}`);
    }
  }

  /**
   * Remove a user and free the username
   */
  async delete(id: number): Promise<void> {
    const user = await this.findById(id);
    if (!user) return;
    await this.kv.atomic().delete(['users', id]).delete(['users_by_username', user.username]).commit();
  }

  async count(): Promise<number> {
    return await this.query().count();
  }

  protected toData(user: User): UserData {
    return user.toData();
  }

  protected fromData(data: UserData): User {
    return User.fromData(data);
  }
}
