/**
 * User Tests
 *
 * The User entity and its KV repository.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { KVStore } from '../../../framework/orm/kv.ts';
import { User } from '../../../src/contexts/accounts/domain/user.ts';
import { UserRepository } from '../../../src/contexts/accounts/infrastructure/user_repository.ts';
import { ConflictError } from '../../../src/shared/application/errors.ts';

async function openRepository(): Promise<{ kv: KVStore; users: UserRepository }> {
  const kv = new KVStore({ path: ':memory:' });
  await kv.init();
  return { kv, users: new UserRepository(kv) };
}

function makeUser(id: number, username: string, names: { firstName?: string; lastName?: string } = {}): User {
  return User.create({ id, username, email: ` ${username}@example.com `, passwordHash: 'hash', ...names });
}

test('User - create trims email and names', () => {
  const user = makeUser(1, 'ada', { firstName: ' Ada ', lastName: 'Lovelace ' });

  assert.equal(user.email, 'ada@example.com');
  assert.equal(user.firstName, 'Ada');
  assert.equal(user.lastName, 'Lovelace');
});

test('User - displayName falls back to the username', () => {
  assert.equal(makeUser(1, 'ada', { firstName: 'Ada', lastName: 'Lovelace' }).displayName, 'Ada Lovelace');
  assert.equal(makeUser(2, 'grace', { firstName: 'Grace' }).displayName, 'Grace');
  assert.equal(makeUser(3, 'anon').displayName, 'anon');
});

test('User - rejects invalid usernames', () => {
  assert.throws(() => makeUser(1, 'has space'), /Invalid username/);
  assert.throws(() => makeUser(1, 'x'.repeat(151)), /Invalid username/);
  assert.doesNotThrow(() => makeUser(1, 'émile.o+b@x-y_z'));
});

test('User - data round trip', () => {
  const user = makeUser(4, 'ada', { firstName: 'Ada' });

  const restored = User.fromData(user.toData());

  assert.deepEqual(restored.toData(), user.toData());
  assert.deepEqual(restored.toSummary(), { id: 4, username: 'ada', displayName: 'Ada' });
  assert.equal(restored.toJSON().passwordHash, undefined);
});

test('User - changePassword replaces the hash', () => {
  const user = makeUser(1, 'ada');

  user.changePassword('new-hash');

  assert.equal(user.passwordHash, 'new-hash');
});

test('UserRepository - insert and look up by username', async () => {
  const { kv, users } = await openRepository();
  await users.insert(makeUser(await users.nextId(), 'ada'));

  const found = await users.findByUsername('ada');

  assert.equal(found?.id, 1);
  assert.deepEqual(await users.findSummaryByUsername('ada'), { id: 1, username: 'ada', displayName: 'ada' });
  assert.deepEqual(await users.findSummary(1), { id: 1, username: 'ada', displayName: 'ada' });
  assert.equal(await users.findByUsername('nobody'), null);
  assert.equal(await users.findSummary(42), null);
  kv.close();
});

test('UserRepository - duplicate usernames conflict', async () => {
  const { kv, users } = await openRepository();
  await users.insert(makeUser(1, 'ada'));

  await assert.rejects(() => users.insert(makeUser(2, 'ada')), ConflictError);
  assert.equal(await users.count(), 1);
  kv.close();
});

test('UserRepository - delete frees the username', async () => {
  const { kv, users } = await openRepository();
  await users.insert(makeUser(1, 'ada'));

  await users.delete(1);
  await users.insert(makeUser(2, 'ada'));

  assert.equal((await users.findByUsername('ada'))?.id, 2);
  kv.close();
});
