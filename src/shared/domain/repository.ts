/**
 * Repository Interface
 *
 * Defines the contract for repositories that persist and retrieve entities.
 * Repositories provide the illusion of an in-memory collection.
 *
 * @module
 */

import type { Entity } from './entity.ts';

/**
 * Base repository interface for entities
 */
export interface Repository<T extends Entity<TId>, TId = number> {
  findById(id: TId): Promise<T | null>;

  /**
   * Save an entity (insert or update)
   */
  save(entity: T): Promise<void>;

  delete(id: TId): Promise<void>;

  exists(id: TId): Promise<boolean>;
}
