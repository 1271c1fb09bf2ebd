/**
 * KV Repository
 *
 * Base repository over the framework KV store. Entities live under
 * `[prefix, id]`; numeric ids come from a sequence named after the prefix.
 *
 * @module
 */

import type { KVStore } from '@framework/orm/kv.ts';
import { query, type Query } from '@framework/orm/query.ts';
import type { Entity } from '../domain/entity.ts';
import type { Repository } from '../domain/repository.ts';

/**
 * Base repository implementation with KV storage
 */
export abstract class KVRepository<T extends Entity<number>, TData extends object>
  implements Repository<T, number> {
  constructor(
    protected readonly kv: KVStore,
    protected readonly prefix: string
  ) {}

  /**
   * Reserve the next id
   */
  async nextId(): Promise<number> {
    return await this.kv.nextSequence(this.prefix);
  }

  async findById(id: number): Promise<T | null> {
    const data = await this.kv.get<TData>([this.prefix, id]);
    return data ? this.fromData(data) : null;
  }

  async save(entity: T): Promise<void> {
    await this.kv.set([this.prefix, entity.id], this.toData(entity));
  }

  async delete(id: number): Promise<void> {
    await this.kv.delete([this.prefix, id]);
  }

  async exists(id: number): Promise<boolean> {
    const data = await this.kv.get([this.prefix, id]);
    return data !== null;
  }

  /**
   * Query builder over the stored records
   */
  protected query(): Query<TData> {
    return query<TData>(this.kv, [this.prefix]);
  }

  /**
   * Convert entity to data for storage
   */
  protected abstract toData(entity: T): TData;

  /**
   * Convert stored data to an entity
   */
  protected abstract fromData(data: TData): T;
}
