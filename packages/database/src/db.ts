/**
 * Database connection: drizzle ORM over a shared pg Pool.
 *
 * Repositories talk to Postgres through the narrow `DbClient` / `DbExecutor` interfaces so that
 * tests can swap in an in-process fake.
 */

import { sql } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';

import * as schema from './schema/index.js';

const { Pool } = pg;

// ============================================
// CLIENT INTERFACES
// ============================================

export type DbQueryResult<R> = Readonly<{
  rows: R[];
  rowCount: number;
}>;

export interface DbClient {
  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<DbQueryResult<R>>;
}

/** A client that can also open a transaction on a dedicated connection. */
export interface DbExecutor extends DbClient {
  transaction<T>(fn: (client: DbClient) => Promise<T>): Promise<T>;
}

export type ReconcilerDatabase = NodePgDatabase<typeof schema>;

// ============================================
// POOL
// ============================================

export type PoolOptions = Readonly<{
  connectionString: string;
  /** Defaults to 10. */
  max?: number;
}>;

export function createPool(options: PoolOptions): pg.Pool {
  return new Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
}

export function createDrizzle(pool: pg.Pool): ReconcilerDatabase {
  return drizzle(pool, { schema });
}

function wrapClient(client: pg.Pool | pg.PoolClient): DbClient {
  return {
    async query<R extends pg.QueryResultRow>(text: string, values: unknown[] = []) {
      const result = await client.query<R>(text, values);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    },
  };
}

export function createExecutor(pool: pg.Pool): DbExecutor {
  const base = wrapClient(pool);
  return {
    query: base.query,
    transaction: (fn) => withTransaction(pool, fn),
  };
}

// ============================================
// HEALTH CHECK
// ============================================

type HealthCheckRow = {
  health: number;
};

/** Used by the readiness endpoint and the startup check. Resolves false instead of throwing. */
export async function checkDatabaseConnection(
  db: ReconcilerDatabase,
  onError?: (error: unknown) => void
): Promise<boolean> {
  try {
    const result = await db.execute<HealthCheckRow>(sql`SELECT 1 AS health`);
    return result.rows[0]?.health === 1;
  } catch (error) {
    onError?.(error);
    return false;
  }
}

export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end();
}

// ============================================
// TRANSACTIONS
// ============================================

/**
 * Runs `fn` inside BEGIN/COMMIT on one pooled connection. A rejection rolls back and rethrows.
 */
export async function withTransaction<T>(
  pool: pg.Pool,
  fn: (client: DbClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(wrapClient(client));
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Nested unit of work inside an open transaction. Only the savepoint's writes roll back when
 * `fn` rejects; the surrounding transaction stays usable.
 */
export async function withSavepoint<T>(
  client: DbClient,
  name: string,
  fn: () => Promise<T>
): Promise<T> {
  if (!/^[a-z_][a-z0-9_]*$/.test(name)) {
    throw new Error(`Invalid savepoint name: ${name}`);
  }
  await client.query(`SAVEPOINT ${name}`);
  try {
    const result = await fn();
    await client.query(`RELEASE SAVEPOINT ${name}`);
    return result;
  } catch (error) {
    await client.query(`ROLLBACK TO SAVEPOINT ${name}`);
    throw error;
  }
}
