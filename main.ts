/**
 * Inkwell Entry Point
 *
 * Boot sequence: configuration, logger, database, seed data, application,
 * then the HTTP server. SIGINT and SIGTERM stop the server and close the
 * database.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { loadConfig } from '@framework/config/config.ts';
import { KVStore } from '@framework/orm/kv.ts';
import { Logger, loggerOptionsFor, setLogger } from '@framework/telemetry/logger.ts';
import { createBlogApp, createServices } from './src/mod.ts';
import { LocalFileStorage } from './src/contexts/blog/infrastructure/file_storage.ts';
import { loadGroupSeed, seedGroups } from './src/contexts/blog/infrastructure/seed.ts';

async function main(): Promise<void> {
  // 1. Configuration
  const config = await loadConfig();
  const { values } = config;

  // 2. Logging
  const logger = new Logger(loggerOptionsFor(values.env, values.logLevel));
  setLogger(logger);

  // 3. Database
  if (values.database.path !== ':memory:') {
    await mkdir(dirname(values.database.path), { recursive: true });
  }
  const kv = new KVStore({ path: values.database.path });
  await kv.init();

  // 4. Services and seed data
  const services = createServices({
    kv,
    storage: new LocalFileStorage(values.media.root),
    config,
    logger,
  });
  await seedGroups(services.content, await loadGroupSeed(values.seed.groups), logger);

  // 5. Application
  const app = createBlogApp(services);

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    app
      .stop()
      .then(() => {
        kv.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // 6. Serve
  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start Inkwell:', error);
  process.exit(1);
});
