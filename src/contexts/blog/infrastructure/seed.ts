/**
 * Group Seed
 *
 * Creates the groups listed in a JSON file. Idempotent: groups whose slug
 * already exists are skipped.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from '@framework/telemetry/logger.ts';
import type { ContentStore } from '../application/content_store.ts';

const SeedFile = z.array(
  z.object({
    title: z.string(),
    slug: z.string(),
    description: z.string().optional(),
  })
);

export type GroupSeed = z.infer<typeof SeedFile>;

/**
 * Create missing groups. Returns the number created.
 */
export async function seedGroups(content: ContentStore, groups: GroupSeed, logger: Logger): Promise<number> {
  const existing = new Set((await content.listGroups()).map((group) => group.slug));

  let created = 0;
  for (const seed of groups) {
    if (existing.has(seed.slug)) {
      continue;
    }
    await content.createGroup(seed);
    existing.add(seed.slug);
    created++;
  }

  if (created > 0) {
    logger.info('Seeded groups', { created });
  }
  return created;
}

/**
 * Read and validate a group seed file
 */
export async function loadGroupSeed(path: string): Promise<GroupSeed> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
  const result = SeedFile.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid group seed file ${path}:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}
