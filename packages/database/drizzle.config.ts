/**
 * Drizzle Kit configuration.
 *
 *   npm run db:generate -w @app/database   generate SQL migrations from schema changes
 *   npm run db:migrate -w @app/database    apply them (src/migrate.ts)
 */

import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/schema/index.ts',
  out: './drizzle/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env['DATABASE_URL'] ?? '',
  },
  verbose: true,
  strict: true,
  casing: 'snake_case',
});
