/**
 * Forward-only migration runner. An advisory lock keeps concurrent runners from racing.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';

import 'dotenv/config';
import { createLogger } from '@app/logger';
import { drizzle } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';

import { createPool } from './db.js';

const MIGRATION_LOCK_ID = 48_213;

const logger = createLogger({ service: 'db-migrate', env: 'production', level: 'info' });

async function run(): Promise<void> {
  const databaseUrl = process.env['DATABASE_URL'];
  if (!databaseUrl) {
    throw new Error('Missing DATABASE_URL');
  }

  const pool = createPool({ connectionString: databaseUrl, max: 1 });
  const migrationsFolder = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../drizzle/migrations'
  );

  const client = await pool.connect();
  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
    await migrate(drizzle(client), { migrationsFolder });
    logger.info({ migrationsFolder }, 'Migrations applied');
  } finally {
    await client
      .query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID])
      .catch((error: unknown) => {
        // the session lock is released with the connection anyway
        logger.warn({ error }, 'Advisory unlock failed');
      });
    client.release();
    await pool.end();
  }
}

run().catch((error: unknown) => {
  logger.fatal({ error }, 'Migration failed');
  process.exit(1);
});
