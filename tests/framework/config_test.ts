/**
 * Configuration Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Config, ConfigError, configFromEnv, loadConfig } from '../../framework/config/config.ts';

test('Config - defaults', () => {
  const config = new Config();

  assert.equal(config.values.port, 8000);
  assert.equal(config.values.host, '0.0.0.0');
  assert.equal(config.get('session.maxAge'), 604800);
  assert.equal(config.get('cache.feedTtl'), 20000);
  assert.equal(config.get('cache.maxEntries'), 300);
  assert.equal(config.get('database.path'), './data/inkwell.db');
  assert.equal(config.get('seed.groups'), './config/groups.json');
});

test('Config - options are deep-merged over defaults', () => {
  const config = new Config({ session: { secure: true } });

  assert.equal(config.values.session.secure, true);
  assert.equal(config.values.session.maxAge, 604800);
});

test('Config - get, set and has by dotted path', () => {
  const config = new Config();

  config.set('media.root', '/srv/media');

  assert.equal(config.get('media.root'), '/srv/media');
  assert.equal(config.has('media.root'), true);
  assert.equal(config.has('media.missing'), false);
  assert.equal(config.get('port.nested'), undefined);
});

test('Config - set rejects values that fail validation', () => {
  const config = new Config();

  assert.throws(() => config.set('port', 'eighty'), ConfigError);
  assert.equal(config.values.port, 8000);
});

test('Config - all returns a copy', () => {
  const config = new Config();

  const copy = config.all();
  copy.port = 1;

  assert.equal(config.values.port, 8000);
});

test('Config - invalid options raise ConfigError with the path', () => {
  assert.throws(
    () => new Config({ logLevel: 'loud' }),
    (error: unknown) => error instanceof ConfigError && error.issues.length === 1 && error.issues[0]?.startsWith('logLevel: ') === true
  );
});

test('Config - feed cache lifetime must be positive', () => {
  assert.throws(
    () => new Config({ cache: { feedTtl: 0 } }),
    (error: unknown) =>
      error instanceof ConfigError && error.issues.length === 1 && error.issues[0]?.startsWith('cache.feedTtl: ') === true
  );
  assert.throws(() => new Config({ cache: { maxEntries: 0 } }), ConfigError);
});

test('configFromEnv - maps environment variables', () => {
  const overlay = configFromEnv({
    PORT: '9000',
    NODE_ENV: 'production',
    DATABASE_PATH: ':memory:',
    SESSION_SECURE: 'true',
    MEDIA_ROOT: '/tmp/media',
  });

  const config = new Config(overlay);

  assert.equal(config.values.port, 9000);
  assert.equal(config.values.env, 'production');
  assert.equal(config.values.database.path, ':memory:');
  assert.equal(config.values.session.secure, true);
  assert.equal(config.values.media.root, '/tmp/media');
  assert.equal(config.values.host, '0.0.0.0');
});

test('configFromEnv - a non-numeric PORT fails validation', () => {
  assert.throws(() => new Config(configFromEnv({ PORT: 'http' })), ConfigError);
});

test('loadConfig - missing file gives defaults', async () => {
  const config = await loadConfig(join(tmpdir(), 'inkwell-no-such-config.json'), {});

  assert.equal(config.values.port, 8000);
});

test('loadConfig - file values are overlaid by the environment', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'inkwell-config-'));
  const path = join(dir, 'app.json');
  await writeFile(path, JSON.stringify({ port: 3000, host: '127.0.0.1', cache: { feedTtl: 5000 } }));

  try {
    const config = await loadConfig(path, { PORT: '4000' });

    assert.equal(config.values.port, 4000);
    assert.equal(config.values.host, '127.0.0.1');
    assert.equal(config.values.cache.feedTtl, 5000);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('loadConfig - a file that is not an object is rejected', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'inkwell-config-'));
  const path = join(dir, 'app.json');
  await writeFile(path, '[1, 2]');

  try {
    await assert.rejects(() => loadConfig(path, {}), ConfigError);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
