/**
 * File Storage Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  LocalFileStorage,
  candidatePaths,
  sanitizeFileName,
} from '../../../src/contexts/blog/infrastructure/file_storage.ts';

const GIF = new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]);

function firstPaths(fileName: string, count: number): string[] {
  const paths: string[] = [];
  for (const path of candidatePaths(fileName)) {
    paths.push(path);
    if (paths.length === count) break;
  }
  return paths;
}

async function withRoot(fn: (root: string) => Promise<void>): Promise<void> {
  const root = await mkdtemp(join(tmpdir(), 'inkwell-media-'));
  try {
    await fn(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

test('sanitizeFileName - keeps a safe character set', () => {
  assert.equal(sanitizeFileName('my photo.gif'), 'my_photo.gif');
  assert.equal(sanitizeFileName('../../etc/passwd'), 'passwd');
  assert.equal(sanitizeFileName('C:\\Users\\me\\cat.png'), 'cat.png');
  assert.equal(sanitizeFileName('...hidden'), 'hidden');
  assert.equal(sanitizeFileName('@@@'), 'upload');
  assert.equal(sanitizeFileName(''), 'upload');
});

test('candidatePaths - numbers names after the first', () => {
  assert.deepEqual(firstPaths('a b.gif', 3), ['posts/a_b.gif', 'posts/a_b_1.gif', 'posts/a_b_2.gif']);
  assert.deepEqual(firstPaths('README', 2), ['posts/README', 'posts/README_1']);
});

test('LocalFileStorage - save, read and delete', async () => {
  await withRoot(async (root) => {
    const storage = new LocalFileStorage(root);

    const path = await storage.save('photo.gif', GIF);

    assert.equal(path, 'posts/photo.gif');
    assert.deepEqual(new Uint8Array(await readFile(join(root, 'posts', 'photo.gif'))), GIF);
    assert.deepEqual(await storage.read(path), GIF);
    assert.equal(await storage.exists(path), true);

    await storage.delete(path);
    assert.equal(await storage.exists(path), false);
    await storage.delete(path);
  });
});

test('LocalFileStorage - taken names get a suffix', async () => {
  await withRoot(async (root) => {
    const storage = new LocalFileStorage(root);

    assert.equal(await storage.save('photo.gif', GIF), 'posts/photo.gif');
    assert.equal(await storage.save('photo.gif', GIF), 'posts/photo_1.gif');
    assert.equal(await storage.save('photo.gif', GIF), 'posts/photo_2.gif');
  });
});

test('LocalFileStorage - reads nothing outside the root', async () => {
  await withRoot(async (root) => {
    const storage = new LocalFileStorage(join(root, 'media'));
    await writeFile(join(root, 'secret.txt'), 'test-secret');
    await storage.save('photo.gif', GIF);

    assert.equal(await storage.read('../secret.txt'), null);
    assert.equal(await storage.read('posts/missing.gif'), null);
    assert.equal(await storage.read('posts'), null);
    await assert.rejects(() => storage.delete('../secret.txt'), /Path escapes media root/);
  });
});
