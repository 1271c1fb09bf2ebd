/**
 * Entity
 *
 * Base class for entities: objects with identity that are not defined by their attributes.
 * Equality is based on the identifier, not on properties.
 *
 * @module
 */

/**
 * Base class for all entities
 */
export abstract class Entity<TId = number> {
  protected readonly _id: TId;
  protected readonly _createdAt: Date;

  constructor(id: TId, createdAt?: Date) {
    this._id = id;
    this._createdAt = createdAt ?? new Date();
  }

  get id(): TId {
    return this._id;
  }

  /**
   * Creation timestamp. Never changes after creation.
   */
  get createdAt(): Date {
    return this._createdAt;
  }

  /**
   * Check equality based on identity
   */
  equals(other: Entity<TId> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }

    if (this === other) {
      return true;
    }

    return other.constructor === this.constructor && this._id === other._id;
  }

  /**
   * Convert entity to plain object
   */
  abstract toJSON(): Record<string, unknown>;
}

/**
 * Type guard for Entity
 */
export function isEntity(obj: unknown): obj is Entity<unknown> {
  return obj instanceof Entity;
}

/**
 * Parse a stored ISO timestamp
 */
export function toDate(value: string | Date): Date {
  return value instanceof Date ? value : new Date(value);
}
