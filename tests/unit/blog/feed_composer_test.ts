/**
 * Feed Composer Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Post } from '../../../src/contexts/blog/domain/post.ts';
import { PostRepository } from '../../../src/contexts/blog/infrastructure/post_repository.ts';
import { NotFoundError } from '../../../src/shared/application/errors.ts';
import { createGroup, createTestApp, createUser } from '../../helpers/test_app.ts';

const START = Date.UTC(2024, 0, 1);

/**
 * Store a post created `minutes` after a fixed start time
 */
async function addPost(
  posts: PostRepository,
  authorId: number,
  text: string,
  minutes: number,
  groupId: number | null = null
): Promise<Post> {
  const post = Post.create({
    id: await posts.nextId(),
    authorId,
    text,
    groupId,
    createdAt: new Date(START + minutes * 60_000),
  });
  await posts.save(post);
  return post;
}

test('FeedComposer - site feed pages of ten, newest first', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const posts = new PostRepository(services.kv);
  for (let i = 1; i <= 12; i++) {
    await addPost(posts, author.id, `Post ${i}`, i);
  }

  const first = await services.feeds.siteFeed(null);
  assert.equal(first.items.length, 10);
  assert.equal(first.items[0]?.post.text, 'Post 12');
  assert.equal(first.items[9]?.post.text, 'Post 3');
  assert.equal(first.totalPages, 2);
  assert.equal(first.total, 12);
  assert.equal(first.hasNext, true);
  assert.equal(first.hasPrevious, false);

  const second = await services.feeds.siteFeed('2');
  assert.deepEqual(
    second.items.map((item) => item.post.text),
    ['Post 2', 'Post 1']
  );
  assert.equal(second.hasNext, false);
  assert.equal(second.hasPrevious, true);
  close();
});

test('FeedComposer - out-of-range pages are clamped', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const posts = new PostRepository(services.kv);
  for (let i = 1; i <= 12; i++) {
    await addPost(posts, author.id, `Post ${i}`, i);
  }

  assert.equal((await services.feeds.siteFeed('99')).number, 2);
  assert.equal((await services.feeds.siteFeed('0')).number, 2);
  assert.equal((await services.feeds.siteFeed('abc')).number, 1);
  close();
});

test('FeedComposer - resolveSitePage matches the page siteFeed serves', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const posts = new PostRepository(services.kv);
  for (let i = 1; i <= 12; i++) {
    await addPost(posts, author.id, `Post ${i}`, i);
  }

  for (const raw of [null, '1', ' 2 ', '99', '0', '-3', 'abc', '1.5']) {
    assert.equal(await services.feeds.resolveSitePage(raw), (await services.feeds.siteFeed(raw)).number);
  }
  assert.equal(await services.feeds.resolveSitePage('99'), 2);
  assert.equal(await services.feeds.resolveSitePage('abc'), 1);
  close();
});

test('FeedComposer - empty site feed has one empty page', async () => {
  const { services, close } = await createTestApp();

  const page = await services.feeds.siteFeed(null);

  assert.deepEqual(page.items, []);
  assert.equal(page.number, 1);
  assert.equal(page.totalPages, 1);
  close();
});

test('FeedComposer - equal timestamps put the higher id first', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const posts = new PostRepository(services.kv);
  const older = await addPost(posts, author.id, 'Older', 5);
  const lower = await addPost(posts, author.id, 'Same time, lower id', 10);
  const higher = await addPost(posts, author.id, 'Same time, higher id', 10);

  const page = await services.feeds.siteFeed(1);

  assert.deepEqual(
    page.items.map((item) => item.post.id),
    [higher.id, lower.id, older.id]
  );
  close();
});

test('FeedComposer - summaries carry author and group', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada', 'Ada');
  const group = await createGroup(services, 'books', 'Books');
  const posts = new PostRepository(services.kv);
  await addPost(posts, author.id, 'Grouped', 1, group.id);
  await addPost(posts, author.id, 'Loose', 2);

  const page = await services.feeds.siteFeed(null);

  assert.deepEqual(page.items[0]?.author, { id: author.id, username: 'ada', displayName: 'Ada' });
  assert.equal(page.items[0]?.group, null);
  assert.deepEqual(page.items[1]?.group, { slug: 'books', title: 'Books' });
  close();
});

test('FeedComposer - group feed holds only that group', async () => {
  const { services, close } = await createTestApp();
  const author = await createUser(services, 'ada');
  const books = await createGroup(services, 'books');
  const travel = await createGroup(services, 'travel');
  const posts = new PostRepository(services.kv);
  await addPost(posts, author.id, 'Novel', 1, books.id);
  await addPost(posts, author.id, 'Trip', 2, travel.id);
  await addPost(posts, author.id, 'Essay', 3, books.id);

  const feed = await services.feeds.groupFeed('books', null);

  assert.equal(feed.group.id, books.id);
  assert.deepEqual(
    feed.page.items.map((item) => item.post.text),
    ['Essay', 'Novel']
  );
  await assert.rejects(() => services.feeds.groupFeed('missing', null), NotFoundError);
  close();
});

test('FeedComposer - profile feed counts the author posts', async () => {
  const { services, close } = await createTestApp();
  const ada = await createUser(services, 'ada', 'Ada');
  const grace = await createUser(services, 'grace');
  const posts = new PostRepository(services.kv);
  for (let i = 1; i <= 11; i++) {
    await addPost(posts, ada.id, `Ada ${i}`, i);
  }
  await addPost(posts, grace.id, 'Grace 1', 20);

  const feed = await services.feeds.profileFeed('ada', null);

  assert.equal(feed.author.id, ada.id);
  assert.equal(feed.postCount, 11);
  assert.equal(feed.page.items.length, 10);
  assert.equal(feed.page.items[0]?.post.text, 'Ada 11');
  await assert.rejects(() => services.feeds.profileFeed('nobody', null), NotFoundError);
  close();
});

test('FeedComposer - follow feed shows followed authors only', async () => {
  const { services, close } = await createTestApp();
  const reader = await createUser(services, 'reader');
  const ada = await createUser(services, 'ada');
  const grace = await createUser(services, 'grace');
  const posts = new PostRepository(services.kv);
  await addPost(posts, ada.id, 'From Ada', 1);
  await addPost(posts, grace.id, 'From Grace', 2);
  await addPost(posts, reader.id, 'From reader', 3);

  assert.equal((await services.feeds.followFeed(reader.id, null)).total, 0);

  await services.content.follow(reader.id, ada.id);
  const feed = await services.feeds.followFeed(reader.id, null);

  assert.deepEqual(
    feed.items.map((item) => item.post.text),
    ['From Ada']
  );
  close();
});
