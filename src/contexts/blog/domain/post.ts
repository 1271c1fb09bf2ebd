/**
 * Post Entity
 *
 * A post always has an author. Its creation time, author and image are
 * fixed at creation; only the text and group can be edited.
 */

import { Entity, toDate } from '../../../shared/domain/entity.ts';
import { ValidationError } from '../../../shared/application/errors.ts';

export interface PostData {
  id: number;
  text: string;
  authorId: number;
  groupId: number | null;
  image: string | null;
  createdAt: string;
}

export function requireText(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw ValidationError.field('text', 'This field is required.');
  }
  return trimmed;
}

export class Post extends Entity<number> {
  private constructor(
    id: number,
    private _text: string,
    readonly authorId: number,
    private _groupId: number | null,
    readonly image: string | null,
    createdAt: Date
  ) {
    super(id, createdAt);
  }

  static create(params: {
    id: number;
    authorId: number;
    text: string;
    groupId?: number | null;
    image?: string | null;
    createdAt?: Date;
  }): Post {
    return new Post(
      params.id,
      requireText(params.text),
      params.authorId,
      params.groupId ?? null,
      params.image ?? null,
      params.createdAt ?? new Date()
    );
  }

  static fromData(data: PostData): Post {
    return new Post(data.id, data.text, data.authorId, data.groupId, data.image, toDate(data.createdAt));
  }

  get text(): string {
    return this._text;
  }

  get groupId(): number | null {
    return this._groupId;
  }

  /**
   * Replace the text and group
   */
  edit(changes: { text: string; groupId: number | null }): void {
    this._text = requireText(changes.text);
    this._groupId = changes.groupId;
  }

  isAuthoredBy(userId: number | null): boolean {
    return userId !== null && userId === this.authorId;
  }

  /**
   * First 15 characters, used as the post's title. Counted by code point
   * so a surrogate pair is never split.
   */
  get excerpt(): string {
    return Array.from(this._text).slice(0, 15).join('');
  }

  toData(): PostData {
    return {
      id: this.id,
      text: this._text,
      authorId: this.authorId,
      groupId: this._groupId,
      image: this.image,
      createdAt: this.createdAt.toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return { ...this.toData() };
  }
}
