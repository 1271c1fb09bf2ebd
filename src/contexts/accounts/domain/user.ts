/**
 * User Entity
 *
 * A registered author or reader.
 */

import { Entity, toDate } from '../../../shared/domain/entity.ts';
import type { AuthUser } from '@framework/auth/auth.ts';

export const USERNAME_PATTERN = /^[\p{L}\p{N}_.@+-]+$/u;
export const USERNAME_MAX_LENGTH = 150;

export interface UserData {
  id: number;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  createdAt: string;
}

/**
 * Public fields of a user, as shown next to their posts
 */
export interface UserSummary {
  id: number;
  username: string;
  displayName: string;
}

export class User extends Entity<number> {
  private constructor(
    id: number,
    private readonly _username: string,
    private _email: string,
    private _firstName: string,
    private _lastName: string,
    private _passwordHash: string,
    createdAt: Date
  ) {
    super(id, createdAt);
  }

  /**
   * Create a new user. Input is expected to be validated already.
   */
  static create(params: {
    id: number;
    username: string;
    email: string;
    firstName?: string;
    lastName?: string;
    passwordHash: string;
  }): User {
    if (!USERNAME_PATTERN.test(params.username) || params.username.length > USERNAME_MAX_LENGTH) {
      throw new Error(`Invalid username: ${params.username}`);
    }

    return new User(
      params.id,
      params.username,
      params.email.trim(),
      params.firstName?.trim() ?? '',
      params.lastName?.trim() ?? '',
      params.passwordHash,
      new Date()
    );
  }

  /**
   * Reconstitute user from persistence
   */
  static fromData(data: UserData): User {
    return new User(
      data.id,
      data.username,
      data.email,
      data.firstName,
      data.lastName,
      data.passwordHash,
      toDate(data.createdAt)
    );
  }

  get username(): string {
    return this._username;
  }

  get email(): string {
    return this._email;
  }

  get firstName(): string {
    return this._firstName;
  }

  get lastName(): string {
    return this._lastName;
  }

  get passwordHash(): string {
    return this._passwordHash;
  }

  /**
   * Full name, or the username when no name was given
   */
  get displayName(): string {
    const fullName = `${this._firstName} ${this._lastName}`.trim();
    return fullName || this._username;
  }

  changePassword(passwordHash: string): void {
    this._passwordHash = passwordHash;
  }

  toSummary(): UserSummary {
    return { id: this.id, username: this.username, displayName: this.displayName };
  }

  toAuthUser(): AuthUser {
    return this.toSummary();
  }

  toData(): UserData {
    return {
      id: this.id,
      username: this._username,
      email: this._email,
      firstName: this._firstName,
      lastName: this._lastName,
      passwordHash: this._passwordHash,
      createdAt: this.createdAt.toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      username: this._username,
      email: this._email,
      displayName: this.displayName,
      createdAt: this.createdAt.toISOString(),
    };
  }
}
