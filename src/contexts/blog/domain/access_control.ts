/**
 * Access Control
 *
 * Who may create and edit content. Pure functions over an explicit session.
 */

import type { Post } from './post.ts';

export interface Session {
  userId: number | null;
}

export const ANONYMOUS: Session = { userId: null };

export function canCreate(session: Session): boolean {
  return session.userId !== null;
}

export function canEdit(session: Session, post: Pick<Post, 'authorId'>): boolean {
  return canCreate(session) && session.userId === post.authorId;
}
