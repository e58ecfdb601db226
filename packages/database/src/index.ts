export {
  checkDatabaseConnection,
  closePool,
  createDrizzle,
  createExecutor,
  createPool,
  withSavepoint,
  withTransaction,
  type DbClient,
  type DbExecutor,
  type DbQueryResult,
  type PoolOptions,
  type ReconcilerDatabase,
} from './db.js';
export * from './repositories/index.js';
export * from './schema/index.js';
