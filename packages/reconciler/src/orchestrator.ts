import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import type {
  DriverCheckpoint,
  InventoryItem,
  MissingProductRecord,
  ReconcileOverview,
  ReconcileRunCounters,
  ReconcileRunSummary,
  ReconcileSettings,
  ReconcileTriggeredBy,
} from '@app/types';

import { readDriverCheckpoint } from './checkpoint.js';
import {
  runChunkedReconciliation,
  type BatchDelays,
  type DriverProgress,
  type DriverResult,
} from './driver.js';
import { InvalidTransitionError, NotFoundError, errorMessage } from './errors.js';
import { ingestFeed, type FeedIngestResult } from './feed-ingestor.js';
import { isValidMissingTransition, resolveMissingProducts } from './missing-resolver.js';
import type {
  AuditStore,
  FeedTransport,
  InventoryStore,
  MissingProductStore,
  ReportDispatcher,
  RunStore,
} from './ports.js';
import { buildOverview, buildRunReport } from './report.js';

export type ReconcileDeps = Readonly<{
  inventory: InventoryStore;
  audit: AuditStore;
  missing: MissingProductStore;
  runs: RunStore;
  feed: FeedTransport;
  reports: ReportDispatcher | null;
  logger: Logger;
  delays: BatchDelays;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}>;

export type RunParams = Readonly<{
  settings: ReconcileSettings;
  triggeredBy: ReconcileTriggeredBy;
  signal?: AbortSignal;
  /** Continue a run left in `running` by an interrupted worker. */
  resumeRunId?: string;
  onRunStarted?: (runId: string) => void | Promise<void>;
  onProgress?: (progress: DriverProgress) => void | Promise<void>;
}>;

export type CreatedFromMissing = Readonly<{
  record: MissingProductRecord;
  item: InventoryItem;
}>;

export interface ReconcileOrchestrator {
  run(params: RunParams): Promise<ReconcileRunSummary>;
  purgeMissing(): Promise<number>;
  markMissingCreated(id: string, note?: string): Promise<MissingProductRecord>;
  markMissingIgnored(id: string): Promise<MissingProductRecord>;
  createItemFromMissing(id: string): Promise<CreatedFromMissing>;
  overview(): Promise<ReconcileOverview>;
}

export function emptyRunCounters(): ReconcileRunCounters {
  return {
    totalItems: 0,
    processed: 0,
    failed: 0,
    batches: 0,
    failedBatches: 0,
    feedRecords: 0,
    feedRowsSkipped: 0,
    missingCreated: 0,
    missingIgnored: 0,
    missingRefreshed: 0,
    missingSkippedByFilter: 0,
  };
}

export function createReconcileOrchestrator(deps: ReconcileDeps): ReconcileOrchestrator {
  const now = deps.now ?? (() => new Date());

  async function prepareNewRun(
    runId: string,
    settings: ReconcileSettings,
    logger: Logger
  ): Promise<void> {
    await deps.audit
      .clearPreviousRun()
      .then((cleared) => logger.info({ ...cleared }, 'Cleared previous run entries'))
      .catch((error: unknown) => {
        logger.error({ runId, error: errorMessage(error) }, 'Failed to clear previous run entries');
      });

    const cutoff = new Date(now().getTime() - settings.missingRetentionHours * 3_600_000);
    await deps.missing
      .purgeStale(cutoff)
      .then((purged) => {
        if (purged > 0) logger.info({ purged, cutoff }, 'Purged stale missing products');
      })
      .catch((error: unknown) => {
        logger.error({ runId, error: errorMessage(error) }, 'Failed to purge stale missing products');
      });
  }

  async function startRun(
    params: RunParams
  ): Promise<{ summary: ReconcileRunSummary; checkpoint: DriverCheckpoint | null }> {
    if (params.resumeRunId) {
      const stored = await deps.runs.findRun(params.resumeRunId);
      if (stored && stored.summary.status === 'running') {
        return { summary: stored.summary, checkpoint: readDriverCheckpoint(stored.checkpoint) };
      }
      deps.logger.warn(
        { runId: params.resumeRunId, found: stored !== null },
        'Run is not resumable; starting a new run'
      );
    }
    const summary = await deps.runs.createRun({
      triggeredBy: params.triggeredBy,
      startedAt: now(),
    });
    return { summary, checkpoint: null };
  }

  async function dispatchReport(
    summary: ReconcileRunSummary,
    settings: ReconcileSettings,
    logger: Logger
  ): Promise<void> {
    if (!settings.notificationsEnabled) return;
    const recipient = settings.recipientEmail;
    if (!deps.reports || !recipient) {
      logger.warn(
        { hasDispatcher: deps.reports !== null, hasRecipient: Boolean(recipient) },
        'Notifications enabled but no report destination configured'
      );
      return;
    }

    const reports = deps.reports;
    await buildRunReport(summary, { audit: deps.audit, missing: deps.missing })
      .then((report) => reports.dispatch({ recipient, report }))
      .then(() => logger.info({ recipient }, 'Run report dispatched'))
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Run report dispatch failed');
      });
  }

  async function run(params: RunParams): Promise<ReconcileRunSummary> {
    const { settings } = params;
    const started = await startRun(params);
    const runId = started.summary.runId;
    const logger = deps.logger.child({ runId, triggeredBy: started.summary.triggeredBy });

    await params.onRunStarted?.(runId);

    return withSpan(
      'reconcile.run',
      { [OTEL_ATTR.RUN_ID]: runId, [OTEL_ATTR.RUN_TRIGGERED_BY]: started.summary.triggeredBy },
      async (span) => {
        const counters = { ...started.summary.counters };

        if (started.checkpoint) {
          logger.info({ afterItemId: started.checkpoint.lastItemId }, 'Resuming interrupted run');
        } else {
          await prepareNewRun(runId, settings, logger);
        }

        const finalize = async (
          status: 'success' | 'fail',
          message: string
        ): Promise<ReconcileRunSummary> => {
          const summary = await deps.runs.finalizeRun(runId, {
            status,
            message,
            counters,
            finishedAt: now(),
          });
          logger.info({ status, message, ...counters }, 'Reconciliation finished');
          await dispatchReport(summary, settings, logger);
          return summary;
        };

        let feed: FeedIngestResult;
        try {
          feed = await ingestFeed({
            transport: deps.feed,
            logger,
            ...(params.signal ? { signal: params.signal } : {}),
          });
        } catch (error) {
          logger.error({ error }, 'Feed ingestion failed; no inventory was changed');
          return finalize('fail', `Feed ingestion failed: ${errorMessage(error)}`);
        }
        counters.feedRecords = feed.acceptedRows;
        counters.feedRowsSkipped = feed.skippedRows;

        let driverResult: DriverResult;
        try {
          driverResult = await runChunkedReconciliation({
            runId,
            store: deps.inventory,
            index: feed.index,
            logger,
            batchSize: settings.batchSize,
            isolation: settings.isolation,
            delays: deps.delays,
            resumeFrom: started.checkpoint,
            now,
            ...(params.signal ? { signal: params.signal } : {}),
            ...(params.onProgress ? { onProgress: params.onProgress } : {}),
            ...(deps.sleep ? { sleep: deps.sleep } : {}),
          });
        } catch (error) {
          logger.error({ error }, 'Reconciliation driver aborted');
          return finalize('fail', `Reconciliation aborted: ${errorMessage(error)}`);
        }

        counters.totalItems = driverResult.totalItems;
        counters.processed = driverResult.processed;
        counters.failed = driverResult.failed;
        counters.batches = driverResult.batches;
        counters.failedBatches = driverResult.failedBatches;
        span.setAttribute(OTEL_ATTR.RUN_TOTAL_ITEMS, driverResult.totalItems);

        if (driverResult.cancelled) {
          return finalize(
            'fail',
            `Reconciliation cancelled after ${driverResult.batches} batches; ${driverResult.notAttempted} items not attempted`
          );
        }

        let missingNote = '';
        try {
          const missing = await resolveMissingProducts({
            index: feed.index,
            matchedSkus: driverResult.matchedSkus,
            settings,
            missingStore: deps.missing,
            inventory: deps.inventory,
            logger,
            now,
          });
          counters.missingCreated = missing.created;
          counters.missingIgnored = missing.ignored;
          counters.missingRefreshed = missing.refreshed;
          counters.missingSkippedByFilter = missing.skippedByFilter;
          if (missing.errors > 0) missingNote = `; ${missing.errors} missing product records failed`;
        } catch (error) {
          logger.error({ error }, 'Missing product resolution failed');
          missingNote = `; missing product resolution failed: ${errorMessage(error)}`;
        }

        return finalize(
          'success',
          `Processed ${driverResult.processed} of ${driverResult.totalItems} items, ${driverResult.failed} failed in ${driverResult.failedBatches} batches${missingNote}`
        );
      }
    );
  }

  async function requireMissing(id: string): Promise<MissingProductRecord> {
    const record = await deps.missing.findById(id);
    if (!record) throw new NotFoundError('Missing product', id);
    return record;
  }

  /** Applies a guarded status change; a record that left `missing` meanwhile is rejected. */
  async function applyTransition(
    id: string,
    to: 'created' | 'ignored',
    note: string
  ): Promise<MissingProductRecord> {
    const updated = await deps.missing.updateStatus(id, to, note);
    if (updated) return updated;
    const current = await requireMissing(id);
    throw new InvalidTransitionError(current.status, to);
  }

  async function transitionMissing(
    id: string,
    to: 'created' | 'ignored',
    note: string
  ): Promise<MissingProductRecord> {
    const record = await requireMissing(id);
    if (!isValidMissingTransition(record.status, to)) {
      throw new InvalidTransitionError(record.status, to);
    }
    return applyTransition(id, to, note);
  }

  return {
    run,

    async purgeMissing() {
      const purged = await deps.missing.purgeAllMissing();
      deps.logger.info({ purged }, 'Purged missing product records');
      return purged;
    },

    markMissingCreated(id, note) {
      return transitionMissing(id, 'created', note ?? 'Marked as created by user');
    },

    markMissingIgnored(id) {
      return transitionMissing(id, 'ignored', 'Marked as ignored by user');
    },

    async createItemFromMissing(id) {
      const record = await requireMissing(id);
      if (!isValidMissingTransition(record.status, 'created')) {
        throw new InvalidTransitionError(record.status, 'created');
      }

      const item = await deps.inventory.createItem({
        name: `Product ${record.sku}`,
        sku: record.sku,
        barcode: record.barcode,
        brand: record.brand,
        itemType: 'stockable',
      });
      const updated = await applyTransition(
        id,
        'created',
        `Product created: ${item.name} (ID: ${item.id})`
      );
      deps.logger.info({ missingProductId: id, itemId: item.id }, 'Created item from missing product');
      return { record: updated, item };
    },

    overview() {
      return buildOverview({ audit: deps.audit, missing: deps.missing, runs: deps.runs });
    },
  };
}
