import 'dotenv/config';

import { defaultReconcileSettings, loadEnv } from '@app/config';
import {
  checkDatabaseConnection,
  closePool,
  createAuditRepository,
  createDrizzle,
  createExecutor,
  createInventoryRepository,
  createMissingProductRepository,
  createPool,
  createRunRepository,
  createSettingsRepository,
} from '@app/database';
import { createLogger } from '@app/logger';
import {
  configFromEnv,
  createQueue,
  createRedisConnection,
  RECONCILE_QUEUE_NAME,
} from '@app/queue-manager';
import { createReconcileOrchestrator } from '@app/reconciler';

import { buildServer } from './http/server.js';
import {
  createQueueRunTrigger,
  registerReconcileSchedule,
  startReconcileWorker,
} from './processors/reconcile/worker.js';
import { createHttpFeedTransport } from './services/feed-client.js';
import { createWebhookReportDispatcher } from './services/report-dispatcher.js';

const env = loadEnv();
const logger = createLogger({
  service: 'backend-worker',
  env: env.nodeEnv,
  level: env.logLevel,
});

const pool = createPool({ connectionString: env.databaseUrl });
const db = createExecutor(pool);
const drizzleDb = createDrizzle(pool);

const inventory = createInventoryRepository(db);
const audit = createAuditRepository(db);
const missing = createMissingProductRepository(db);
const runs = createRunRepository(db);
const settings = createSettingsRepository(db, defaultReconcileSettings(env));

const reports = env.reportWebhookUrl
  ? createWebhookReportDispatcher({
      url: env.reportWebhookUrl,
      secret: env.reportWebhookSecret,
      logger: logger.child({ component: 'report-dispatcher' }),
    })
  : null;

const orchestrator = createReconcileOrchestrator({
  inventory,
  audit,
  missing,
  runs,
  feed: createHttpFeedTransport({ url: env.feedUrl, timeoutMs: env.feedTimeoutMs }),
  reports,
  logger: logger.child({ component: 'reconciler' }),
  delays: { normalMs: env.batchDelayMs, largeMs: env.largeBatchDelayMs },
});

const queueConfig = configFromEnv(env);
const queue = createQueue({ config: queueConfig, logger }, { name: RECONCILE_QUEUE_NAME });
const redis = createRedisConnection({ redisUrl: env.redisUrl });
const shutdownController = new AbortController();

const server = await buildServer({
  logger,
  exposeInternalErrors: env.nodeEnv !== 'production',
  readiness: {
    database: () => checkDatabaseConnection(drizzleDb),
    redis: async () => (await redis.ping()) === 'PONG',
  },
  reconcile: { orchestrator, runs, settings, trigger: createQueueRunTrigger(queue) },
  missingProducts: { orchestrator, missing },
});

let worker: ReturnType<typeof startReconcileWorker> | null = null;

const shutdown = async (signal: string): Promise<void> => {
  logger.info({ signal }, 'shutdown started');
  // an active run stops at its next batch boundary and is resumed from its checkpoint
  shutdownController.abort(new Error(`Received ${signal}`));
  try {
    if (worker) {
      await worker.close();
      worker = null;
      logger.info({ signal }, 'reconcile worker stopped');
    }

    await queue.close();
    await server.close();
    await redis.quit();
    await closePool(pool);
    logger.info({ signal }, 'shutdown complete');
  } catch (error) {
    logger.error({ error, signal }, 'shutdown failed');
    process.exitCode = 1;
  }
};

try {
  const dbReady = await checkDatabaseConnection(drizzleDb, (error) => {
    logger.error({ error }, 'database check failed');
  });
  if (!dbReady) throw new Error('Database is not reachable');

  await server.listen({ port: env.port, host: '0.0.0.0' });
  logger.info({ port: env.port }, 'server listening');

  worker = startReconcileWorker({
    config: queueConfig,
    deps: { orchestrator, settings, logger },
    shutdownSignal: shutdownController.signal,
  });
  logger.info({}, 'reconcile worker started');

  await registerReconcileSchedule(
    queue,
    { cron: env.reconcileCron, timezone: env.reconcileTimezone },
    logger
  );
} catch (error) {
  logger.fatal({ error }, 'server failed to start');
  process.exitCode = 1;
  await shutdown('startup-failure');
}

process.once('SIGTERM', () => void shutdown('SIGTERM'));
process.once('SIGINT', () => void shutdown('SIGINT'));
