/**
 * Group Entity
 *
 * A community that posts may be tagged to. Groups are created by an
 * administrator and are never owned by a post.
 */

import { z } from 'zod';
import { Entity, toDate } from '../../../shared/domain/entity.ts';
import { validationErrorFrom } from '../../../shared/application/errors.ts';

export const GroupFields = z.object({
  title: z.string().trim().min(1, 'This field is required.').max(200, 'Ensure this value has at most 200 characters.'),
  slug: z
    .string()
    .trim()
    .min(1, 'This field is required.')
    .regex(/^[-a-zA-Z0-9_]+$/, 'Enter a valid “slug” consisting of letters, numbers, underscores or hyphens.'),
  description: z.string().trim().default(''),
});

export interface GroupData {
  id: number;
  title: string;
  slug: string;
  description: string;
  createdAt: string;
}

export class Group extends Entity<number> {
  private constructor(
    id: number,
    readonly title: string,
    readonly slug: string,
    readonly description: string,
    createdAt: Date
  ) {
    super(id, createdAt);
  }

  /**
   * Create a new group. `ValidationError` for a missing title or bad slug.
   */
  static create(params: { id: number; title: string; slug: string; description?: string }): Group {
    const parsed = GroupFields.safeParse(params);
    if (!parsed.success) {
      throw validationErrorFrom(parsed.error);
    }
    const { title, slug, description } = parsed.data;
    return new Group(params.id, title, slug, description, new Date());
  }

  static fromData(data: GroupData): Group {
    return new Group(data.id, data.title, data.slug, data.description, toDate(data.createdAt));
  }

  toData(): GroupData {
    return {
      id: this.id,
      title: this.title,
      slug: this.slug,
      description: this.description,
      createdAt: this.createdAt.toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return { ...this.toData() };
  }

  toString(): string {
    return this.title;
  }
}
