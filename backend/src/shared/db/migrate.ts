/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Apply schema migrations before the API starts (or in CI).
 * - TS migrations live next to this file in ./migrations and are loaded through tsx.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import path from 'node:path';
import { readdir } from 'node:fs/promises';
import { fileURLToPath, pathToFileURL } from 'node:url';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const migrationsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

function isMigration(mod: unknown): mod is Migration {
  return (
    typeof mod === 'object' &&
    mod !== null &&
    'up' in mod &&
    typeof mod.up === 'function'
  );
}

const provider: MigrationProvider = {
  async getMigrations() {
    const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('db.migrations.found', { count: files.length, files });

    const migrations: Record<string, Migration> = {};
    for (const file of files) {
      const mod: unknown = await import(pathToFileURL(path.join(migrationsDir, file)).href);
      if (!isMigration(mod)) throw new Error(`Migration ${file} does not export up()`);

      migrations[file.replace(/\.ts$/, '')] = mod;
    }

    return migrations;
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({ databaseUrl: config.databaseUrl, connectTimeoutMs: config.storeTimeoutMs });

  try {
    const { error, results } = await new Migrator({ db, provider }).migrateToLatest();

    results?.forEach((r) => {
      if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
      if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
    });

    if (error) throw error;
    logger.info('db.migrations.up_to_date');
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrations.failed', { error: err });
  process.exit(1);
});
