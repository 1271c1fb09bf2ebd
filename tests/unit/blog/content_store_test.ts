/**
 * Content Store Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommentRepository } from '../../../src/contexts/blog/infrastructure/comment_repository.ts';
import { FollowRepository } from '../../../src/contexts/blog/infrastructure/follow_repository.ts';
import { loadGroupSeed, seedGroups } from '../../../src/contexts/blog/infrastructure/seed.ts';
import { ConflictError, NotFoundError, ValidationError } from '../../../src/shared/application/errors.ts';
import { createGroup, createTestApp, createUser } from '../../helpers/test_app.ts';

const INVALID_CHOICE = 'Select a valid choice. That choice is not one of the available choices.';

test('ContentStore - createPost stores text, group and image', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const group = await createGroup(services, 'books');

  const post = await services.content.createPost({
    authorId: author.id,
    text: 'Reading list',
    groupId: group.id,
    image: 'posts/cover.gif',
  });

  const stored = await services.content.getPost(post.id);
  assert.equal(stored.text, 'Reading list');
  assert.equal(stored.groupId, group.id);
  assert.equal(stored.image, 'posts/cover.gif');
  assert.equal(stored.authorId, author.id);
  assert.equal(await services.content.countPosts(), 1);
  assert.equal(await services.content.countPostsBy(author.id), 1);
  close();
});

test('ContentStore - createPost reports text and group errors together', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');

  await assert.rejects(
    () => services.content.createPost({ authorId: author.id, text: '   ', groupId: 99 }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.fields.text?.[0] === 'This field is required.' &&
      error.fields.group?.[0] === INVALID_CHOICE
  );
  assert.equal(await services.content.countPosts(), 0);
  close();
});

test('ContentStore - updatePost keeps image, author and creation time', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const group = await createGroup(services, 'travel');
  const post = await services.content.createPost({ authorId: author.id, text: 'Draft', image: 'posts/a.gif' });

  await services.content.updatePost(post, { text: 'Final', groupId: group.id });

  const stored = await services.content.getPost(post.id);
  assert.equal(stored.text, 'Final');
  assert.equal(stored.groupId, group.id);
  assert.equal(stored.image, 'posts/a.gif');
  assert.equal(stored.createdAt.getTime(), post.createdAt.getTime());
  close();
});

test('ContentStore - updatePost validates like createPost', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const post = await services.content.createPost({ authorId: author.id, text: 'Draft' });

  await assert.rejects(() => services.content.updatePost(post, { text: 'Final', groupId: 42 }), ValidationError);
  assert.equal((await services.content.getPost(post.id)).text, 'Draft');
  close();
});

test('ContentStore - deletePost removes its comments', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const post = await services.content.createPost({ authorId: author.id, text: 'Short-lived' });
  const other = await services.content.createPost({ authorId: author.id, text: 'Stays' });
  await services.content.createComment(post, author.id, 'First');
  await services.content.createComment(post, author.id, 'Second');
  await services.content.createComment(other, author.id, 'Elsewhere');
  const comments = new CommentRepository(services.kv);

  await services.content.deletePost(post.id);

  await assert.rejects(() => services.content.getPost(post.id), NotFoundError);
  assert.equal(await comments.countForPost(post.id), 0);
  assert.equal(await comments.countForPost(other.id), 1);
  await services.content.deletePost(post.id);
  close();
});

test('ContentStore - comments list oldest first', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const reader = await createUser(services, 'grace');
  const post = await services.content.createPost({ authorId: author.id, text: 'Discuss' });

  await services.content.createComment(post, reader.id, 'First!');
  await services.content.createComment(post, author.id, 'Thanks');

  const comments = await services.content.listComments(post.id);
  assert.deepEqual(
    comments.map((comment) => [comment.text, comment.authorId]),
    [
      ['First!', reader.id],
      ['Thanks', author.id],
    ]
  );
  await assert.rejects(() => services.content.createComment(post, reader.id, ' '), ValidationError);
  close();
});

test('ContentStore - follow and unfollow', async () => {
  const { services, close } = await createTestApp();
  const reader = await createUser(services, 'grace');
  const author = await createUser(services, 'ada');
  const follows = new FollowRepository(services.kv);

  assert.equal(await services.content.isFollowing(reader.id, author.id), false);

  await services.content.follow(reader.id, author.id);
  assert.equal(await services.content.isFollowing(reader.id, author.id), true);
  assert.equal((await follows.find(reader.id, author.id))?.authorId, author.id);
  await assert.rejects(() => services.content.follow(reader.id, author.id), ConflictError);

  await services.content.unfollow(reader.id, author.id);
  await services.content.unfollow(reader.id, author.id);
  assert.equal(await services.content.isFollowing(reader.id, author.id), false);
  assert.equal(await follows.find(reader.id, author.id), null);
  close();
});

test('ContentStore - self-follow is a conflict', async () => {
  const { services, close } = await createTestApp();
  const user = await createUser(services, 'ada');

  await assert.rejects(() => services.content.follow(user.id, user.id), ConflictError);
  assert.equal(await services.content.isFollowing(user.id, user.id), false);
  close();
});

test('ContentStore - groups by slug and by title', async () => {
  const { services, close } = await createTestApp();
  await createGroup(services, 'travel', 'Travel');
  const books = await createGroup(services, 'books', 'Books');

  assert.deepEqual(
    (await services.content.listGroups()).map((group) => group.slug),
    ['books', 'travel']
  );
  assert.equal((await services.content.getGroupBySlug('books')).id, books.id);
  assert.equal((await services.content.findGroup(books.id))?.slug, 'books');
  assert.equal(await services.content.findGroup(99), null);
  await assert.rejects(() => services.content.getGroupBySlug('missing'), NotFoundError);
  await assert.rejects(() => createGroup(services, 'books', 'Books again'), ConflictError);
  close();
});

test('ContentStore - getPost raises NotFoundError', async () => {
  const { services, close } = await createTestApp();

  await assert.rejects(
    () => services.content.getPost(404),
    (error: unknown) => error instanceof NotFoundError && error.message === 'Post not found: 404'
  );
  close();
});

// Seed

test('seedGroups - creates missing groups once', async () => {
  const { services, logs, close } = await createTestApp();
  await createGroup(services, 'books', 'Books');
  const seed = [
    { title: 'Books', slug: 'books' },
    { title: 'Travel', slug: 'travel', description: 'Trips' },
  ];

  assert.equal(await seedGroups(services.content, seed, services.logger), 1);
  assert.equal(await seedGroups(services.content, seed, services.logger), 0);

  assert.equal((await services.content.getGroupBySlug('travel')).description, 'Trips');
  assert.equal(logs.filter((entry) => entry.message === 'Seeded groups').length, 1);
  close();
});

test('loadGroupSeed - validates the file', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'inkwell-seed-'));
  const good = join(dir, 'good.json');
  const bad = join(dir, 'bad.json');
  await writeFile(good, JSON.stringify([{ title: 'Books', slug: 'books' }]));
  await writeFile(bad, JSON.stringify([{ title: 'Books' }]));

  try {
    assert.deepEqual(await loadGroupSeed(good), [{ title: 'Books', slug: 'books' }]);
    await assert.rejects(() => loadGroupSeed(bad), /Invalid group seed file/);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('loadGroupSeed - the bundled seed file is valid', async () => {
  const groups = await loadGroupSeed(new URL('../../../config/groups.json', import.meta.url).pathname);

  assert.ok(groups.length > 0);
});
