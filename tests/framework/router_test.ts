/**
 * Router Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Router } from '../../framework/router/router.ts';
import { buildUrl, parsePathParams } from '../../framework/router/patterns.ts';

const handler = () => new Response('ok');

test('Router - matches static route', () => {
  const router = new Router();
  router.get('/users/', handler);

  const match = router.match('GET', '/users/');

  assert.ok(match);
  assert.deepEqual(match.params, {});
});

test('Router - matches route with parameters', () => {
  const router = new Router();
  router.get('/profile/:username/', handler);

  const match = router.match('GET', '/profile/ada/');

  assert.deepEqual(match?.params, { username: 'ada' });
});

test('Router - decodes percent-encoded parameters', () => {
  const router = new Router();
  router.get('/profile/:username/', handler);

  const match = router.match('GET', '/profile/%C3%A9mile/');

  assert.equal(match?.params.username, 'émile');
});

test('Router - regex constraint rejects non-matching values', () => {
  const router = new Router();
  router.get('/posts/:id(\\d+)/', handler);

  assert.equal(router.match('GET', '/posts/abc/'), null);
  assert.equal(router.match('GET', '/posts/42/')?.params.id, '42');
});

test('Router - multi-segment parameter keeps slashes', () => {
  const router = new Router();
  router.get('/media/:path+', handler);

  assert.equal(router.match('GET', '/media/posts/a.gif')?.params.path, 'posts/a.gif');
});

test('Router - method must match, HEAD falls back to GET', () => {
  const router = new Router();
  router.get('/feed/', handler);
  router.post('/submit/', handler);

  assert.equal(router.match('POST', '/feed/'), null);
  assert.ok(router.match('HEAD', '/feed/'));
  assert.ok(router.match('POST', '/submit/'));
  assert.equal(router.hasPath('/submit/'), true);
  assert.equal(router.hasPath('/missing/'), false);
});

test('Router - several methods on one route', () => {
  const router = new Router();
  router.addRoute(['GET', 'POST'], '/create/', handler);

  assert.ok(router.match('GET', '/create/'));
  assert.ok(router.match('POST', '/create/'));
  assert.equal(router.match('DELETE', '/create/'), null);
});

test('Router - first registered match wins', () => {
  const router = new Router();
  const first = () => new Response('first');
  router.get('/follow/', first);
  router.get('/:slug/', handler);

  assert.equal(router.match('GET', '/follow/')?.handler, first);
});

test('Router - mount adds a prefix', () => {
  const auth = new Router();
  auth.get('/login/', handler, { name: 'login' });

  const root = new Router();
  root.mount('/auth', auth);

  assert.ok(root.match('GET', '/auth/login/'));
  assert.equal(root.url('login'), '/auth/login/');
});

test('Router - url builds named routes with params and query', () => {
  const router = new Router();
  router.get('/posts/:id(\\d+)/', handler, { name: 'post_detail' });
  router.get('/group/:slug/', handler, { name: 'group_list' });

  assert.equal(router.url('post_detail', { id: '7' }), '/posts/7/');
  assert.equal(router.url('group_list', { slug: 'books' }, { page: '2' }), '/group/books/?page=2');
  assert.equal(router.url('missing'), null);
});

test('buildUrl - encodes values and keeps slashes in multi-segment params', () => {
  assert.equal(buildUrl('/profile/:username/', { username: 'a b' }), '/profile/a%20b/');
  assert.equal(buildUrl('/media/:path+', { path: 'posts/a b.gif' }), '/media/posts/a%20b.gif');
  assert.equal(buildUrl('/x/:missing/', {}), '/x/:missing/');
});

test('parsePathParams - lists parameter names', () => {
  assert.deepEqual(parsePathParams('/posts/:id(\\d+)/comment/:commentId/'), ['id', 'commentId']);
});
