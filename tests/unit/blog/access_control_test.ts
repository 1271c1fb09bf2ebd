/**
 * Access Control Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ANONYMOUS, canCreate, canEdit } from '../../../src/contexts/blog/domain/access_control.ts';
import { sessionFrom } from '../../../src/contexts/blog/presentation/post_routes.ts';

test('canCreate - only signed-in sessions', () => {
  assert.equal(canCreate(ANONYMOUS), false);
  assert.equal(canCreate({ userId: 3 }), true);
});

test('canEdit - only the author', () => {
  const post = { authorId: 3 };

  assert.equal(canEdit({ userId: 3 }, post), true);
  assert.equal(canEdit({ userId: 4 }, post), false);
  assert.equal(canEdit(ANONYMOUS, post), false);
});

test('sessionFrom - maps the signed-in user to a session', () => {
  assert.deepEqual(sessionFrom(null), { userId: null });
  assert.deepEqual(sessionFrom({ id: 7, username: 'ada', displayName: 'Ada' }), { userId: 7 });
});
