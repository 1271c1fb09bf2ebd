/**
 * Author lookups the blog needs from the user directory
 */

export interface AuthorSummary {
  id: number;
  username: string;
  displayName: string;
}

export interface AuthorDirectory {
  findSummary(id: number): Promise<AuthorSummary | null>;
  findSummaryByUsername(username: string): Promise<AuthorSummary | null>;
}
