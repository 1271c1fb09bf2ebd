/**
 * Group Repository
 *
 * Groups live under `['groups', id]` with a unique slug index at
 * `['groups_by_slug', slug]`.
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { KVRepository } from '../../../shared/infrastructure/kv_repository.ts';
import { ConflictError } from '../../../shared/application/errors.ts';
import { Group, type GroupData } from '../domain/group.ts';

export class GroupRepository extends KVRepository<Group, GroupData> {
  constructor(kv: KVStore) {
    super(kv, 'groups');
  }

  async findBySlug(slug: string): Promise<Group | null> {
    const id = await this.kv.get<number>(['groups_by_slug', slug]);
    return id === null ? null : await this.findById(id);
  }

  /**
   * Insert a new group. `ConflictError` when the slug is taken.
   */
  async insert(group: Group): Promise<void> {
    const indexKey = ['groups_by_slug', group.slug];
    const result = await this.kv
      .atomic()
      .check({ key: indexKey, versionstamp: null })
      .set(['groups', group.id], group.toData())
      .set(indexKey, group.id)
      .commit();

    if (!result.ok) {
      throw new ConflictError(`Group slug already taken: ${group.slug}`);
    }
  }

  /**
   * All groups ordered by title
   */
  async listByTitle(): Promise<Group[]> {
    const data = await this.query().orderBy('title').orderBy('id').all();
    return data.map((item) => this.fromData(item));
  }

  protected toData(group: Group): GroupData {
    return group.toData();
  }

  protected fromData(data: GroupData): Group {
    return Group.fromData(data);
  }
}
