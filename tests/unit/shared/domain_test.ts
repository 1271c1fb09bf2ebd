/**
 * Shared Domain Tests
 *
 * Entity identity and the application error taxonomy.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { Entity, isEntity, toDate } from '../../../src/shared/domain/entity.ts';
import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  UseCaseError,
  UseCaseErrorCodes,
  ValidationError,
  validationErrorFrom,
} from '../../../src/shared/application/errors.ts';

class TestEntity extends Entity<number> {
  constructor(id: number, private name: string) {
    super(id);
  }

  toJSON(): Record<string, unknown> {
    return { id: this.id, name: this.name };
  }
}

class OtherEntity extends Entity<number> {
  toJSON(): Record<string, unknown> {
    return { id: this.id };
  }
}

test('Entity - equality is by id and type', () => {
  const a = new TestEntity(1, 'a');

  assert.equal(a.equals(new TestEntity(1, 'renamed')), true);
  assert.equal(a.equals(new TestEntity(2, 'a')), false);
  assert.equal(a.equals(new OtherEntity(1)), false);
  assert.equal(a.equals(null), false);
  assert.equal(a.equals(a), true);
});

test('Entity - createdAt defaults to now', () => {
  const before = Date.now();
  const entity = new TestEntity(1, 'a');

  assert.ok(entity.createdAt.getTime() >= before);
  assert.equal(isEntity(entity), true);
  assert.equal(isEntity({ id: 1 }), false);
});

test('toDate - parses ISO strings and passes dates through', () => {
  const date = new Date('2024-05-01T10:00:00.000Z');

  assert.equal(toDate('2024-05-01T10:00:00.000Z').getTime(), date.getTime());
  assert.equal(toDate(date), date);
});

test('ValidationError - carries fields and code', () => {
  const error = new ValidationError({ text: ['This field is required.'], group: ['Bad group'] });

  assert.ok(error instanceof UseCaseError);
  assert.equal(error.code, UseCaseErrorCodes.VALIDATION_ERROR);
  assert.equal(error.message, 'Validation failed: text, group');
  assert.deepEqual(ValidationError.field('text', 'Required').fields, { text: ['Required'] });
});

test('NotFoundError, AuthorizationError and ConflictError codes', () => {
  const notFound = new NotFoundError('Post', 7);

  assert.equal(notFound.message, 'Post not found: 7');
  assert.equal(notFound.code, 'NOT_FOUND');
  assert.deepEqual(notFound.details, { resource: 'Post', identifier: 7 });
  assert.equal(new AuthorizationError().code, 'UNAUTHORIZED');
  assert.equal(new AuthorizationError().redirect, null);
  assert.deepEqual(new AuthorizationError('Not yours', '/posts/7/').details, { redirect: '/posts/7/' });
  assert.equal(new ConflictError('taken').code, 'CONFLICT');
});

test('validationErrorFrom - groups messages by field path', () => {
  const schema = z
    .object({ name: z.string().min(2, 'Too short'), age: z.number() })
    .refine(() => false, 'Form is invalid');

  const nested = z.object({ name: z.string().min(2, 'Too short').max(1, 'Too long') });
  const result = nested.safeParse({ name: 'abc' });
  assert.equal(result.success, false);
  if (!result.success) {
    assert.deepEqual(validationErrorFrom(result.error).fields, { name: ['Too long'] });
  }

  const formResult = schema.safeParse({ name: 'ab', age: 3 });
  assert.equal(formResult.success, false);
  if (!formResult.success) {
    assert.deepEqual(validationErrorFrom(formResult.error).fields, { __all__: ['Form is invalid'] });
  }
});
