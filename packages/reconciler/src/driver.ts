import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import type { DriverCheckpoint, FailureIsolation, InventoryItem } from '@app/types';

import { BatchProcessingError, errorMessage } from './errors.js';
import type { FeedIndex } from './feed-ingestor.js';
import { reconcileItem } from './matcher.js';
import type { BatchSession, InventoryStore } from './ports.js';

export const DEFAULT_BATCH_SIZE = 100;

const LARGE_INVENTORY = 5_000;
const HUGE_INVENTORY = 8_000;

export type BatchDelays = Readonly<{
  normalMs: number;
  /** Used when the inventory exceeds 8000 items. */
  largeMs: number;
}>;

export type BatchResult = Readonly<{
  processed: number;
  failed: number;
  matchedSkus: ReadonlySet<string>;
  error: BatchProcessingError | null;
}>;

export type DriverProgress = Readonly<{
  batchIndex: number;
  totalItems: number;
  processed: number;
  failed: number;
}>;

export type DriverResult = Readonly<{
  totalItems: number;
  batchSize: number;
  processed: number;
  failed: number;
  batches: number;
  failedBatches: number;
  matchedSkus: ReadonlySet<string>;
  cancelled: boolean;
  /** Items never attempted because the run stopped early. */
  notAttempted: number;
}>;

export type DriverOptions = Readonly<{
  runId: string;
  store: InventoryStore;
  index: FeedIndex;
  logger: Logger;
  batchSize?: number;
  isolation?: FailureIsolation;
  delays: BatchDelays;
  signal?: AbortSignal;
  resumeFrom?: DriverCheckpoint | null;
  onProgress?: (progress: DriverProgress) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}>;

/** Shrinks the batch size for large inventories. Never grows it. */
export function effectiveBatchSize(requested: number, totalItems: number): number {
  const base = Math.max(1, Math.trunc(requested));
  if (totalItems > HUGE_INVENTORY) return Math.min(base, 80);
  if (totalItems > LARGE_INVENTORY) return Math.min(base, 100);
  return base;
}

export function interBatchDelayMs(totalItems: number, delays: BatchDelays): number {
  return totalItems > HUGE_INVENTORY ? delays.largeMs : delays.normalMs;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function applyItem(
  session: BatchSession,
  item: InventoryItem,
  index: FeedIndex
): Promise<string | null> {
  const outcome = reconcileItem(item, index);

  await session.appendLogEntry(outcome.logEntry);
  if (outcome.unpublishedEntry) {
    await session.appendUnpublishedEntry(outcome.unpublishedEntry);
  }
  if (outcome.stockMutation) {
    await session.setOnHandQuantity(
      item.id,
      outcome.stockMutation.previousQuantity,
      outcome.stockMutation.newQuantity
    );
  }
  if (outcome.publish !== item.isPublished) {
    await session.setPublished(item.id, outcome.publish);
  }

  return outcome.match.consumedSku;
}

type DriverState = {
  processed: number;
  failed: number;
  batches: number;
  failedBatches: number;
  matchedSkus: Set<string>;
  lastItemId: string | null;
};

function toCheckpoint(state: DriverState, now: Date): DriverCheckpoint {
  return {
    version: 1,
    lastItemId: state.lastItemId,
    processed: state.processed,
    failed: state.failed,
    batches: state.batches,
    failedBatches: state.failedBatches,
    matchedSkus: [...state.matchedSkus],
    updatedAtIso: now.toISOString(),
  };
}

/**
 * Walks the reconciliation set in keyset-paginated batches. Each batch commits on its own
 * together with the run checkpoint; a failed batch is counted and skipped.
 */
export async function runChunkedReconciliation(options: DriverOptions): Promise<DriverResult> {
  const { runId, store, index, logger, delays, signal } = options;
  const isolation = options.isolation ?? 'batch';
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());

  const totalItems = await store.countReconcilableItems();
  const batchSize = effectiveBatchSize(options.batchSize ?? DEFAULT_BATCH_SIZE, totalItems);
  const delayMs = interBatchDelayMs(totalItems, delays);

  const resume = options.resumeFrom ?? null;
  const state: DriverState = {
    processed: resume?.processed ?? 0,
    failed: resume?.failed ?? 0,
    batches: resume?.batches ?? 0,
    failedBatches: resume?.failedBatches ?? 0,
    matchedSkus: new Set(resume?.matchedSkus ?? []),
    lastItemId: resume?.lastItemId ?? null,
  };

  if (batchSize !== (options.batchSize ?? DEFAULT_BATCH_SIZE)) {
    logger.info(
      { totalItems, requestedBatchSize: options.batchSize ?? DEFAULT_BATCH_SIZE, batchSize },
      'Large inventory detected; reduced batch size'
    );
  }
  if (resume) {
    logger.info(
      { runId, afterItemId: resume.lastItemId, batches: resume.batches },
      'Resuming reconciliation from checkpoint'
    );
  }

  let cancelled = false;
  let first = true;

  for (;;) {
    if (!first && delayMs > 0) {
      await sleep(delayMs);
    }
    first = false;

    if (signal?.aborted) {
      cancelled = true;
      break;
    }

    const items = await store.listReconcilableItems({
      afterId: state.lastItemId,
      limit: batchSize,
    });
    if (items.length === 0) break;

    const batchIndex = state.batches + 1;
    const result = await withSpan(
      'reconcile.batch',
      {
        [OTEL_ATTR.RUN_ID]: runId,
        [OTEL_ATTR.BATCH_INDEX]: batchIndex,
        [OTEL_ATTR.BATCH_SIZE]: items.length,
      },
      () => processBatch({ runId, store, index, items, batchIndex, isolation, state, logger, now })
    );

    state.batches = batchIndex;
    state.lastItemId = items[items.length - 1]?.id ?? state.lastItemId;
    state.processed += result.processed;
    state.failed += result.failed;
    for (const sku of result.matchedSkus) state.matchedSkus.add(sku);

    if (result.error) {
      state.failedBatches += 1;
      logger.error(
        { runId, batchIndex, itemCount: items.length, error: result.error },
        'Batch failed; all items counted as failed'
      );
      // The batch transaction rolled back with its checkpoint; persist the skip separately.
      await store
        .withBatch((session) => session.saveCheckpoint(runId, toCheckpoint(state, now())))
        .catch((error: unknown) => {
          logger.warn({ runId, batchIndex, error: errorMessage(error) }, 'Checkpoint write failed');
        });
    } else {
      logger.info(
        {
          runId,
          batchIndex,
          processed: state.processed,
          failed: state.failed,
          totalItems,
        },
        'Batch completed'
      );
    }

    if (options.onProgress) {
      await options.onProgress({
        batchIndex,
        totalItems,
        processed: state.processed,
        failed: state.failed,
      });
    }

    if (items.length < batchSize) break;
  }

  const attempted = state.processed + state.failed;
  return {
    totalItems,
    batchSize,
    processed: state.processed,
    failed: state.failed,
    batches: state.batches,
    failedBatches: state.failedBatches,
    matchedSkus: state.matchedSkus,
    cancelled,
    notAttempted: cancelled ? Math.max(0, totalItems - attempted) : 0,
  };
}

/**
 * One batch inside one store transaction. In `batch` isolation any item error rolls the whole
 * batch back; in `item` isolation the failing item's savepoint is rolled back and the rest commits.
 */
export async function processBatch(params: {
  runId: string;
  store: InventoryStore;
  index: FeedIndex;
  items: readonly InventoryItem[];
  batchIndex: number;
  isolation: FailureIsolation;
  state: Readonly<DriverState>;
  logger: Logger;
  now: () => Date;
}): Promise<BatchResult> {
  const { runId, store, index, items, batchIndex, isolation, state, logger, now } = params;
  const lastItemId = items[items.length - 1]?.id ?? state.lastItemId;

  try {
    return await store.withBatch(async (session) => {
      const matchedSkus = new Set<string>();
      let processed = 0;
      let failed = 0;

      for (const item of items) {
        if (isolation === 'batch') {
          const consumed = await applyItem(session, item, index);
          if (consumed) matchedSkus.add(consumed);
          processed += 1;
          continue;
        }

        try {
          const consumed = await session.savepoint(() => applyItem(session, item, index));
          if (consumed) matchedSkus.add(consumed);
          processed += 1;
        } catch (error) {
          failed += 1;
          logger.warn(
            { runId, batchIndex, itemId: item.id, error: errorMessage(error) },
            'Item failed; rolled back to savepoint'
          );
        }
      }

      const nextMatched = new Set(state.matchedSkus);
      for (const sku of matchedSkus) nextMatched.add(sku);
      await session.saveCheckpoint(
        runId,
        toCheckpoint(
          {
            processed: state.processed + processed,
            failed: state.failed + failed,
            batches: batchIndex,
            failedBatches: state.failedBatches,
            matchedSkus: nextMatched,
            lastItemId,
          },
          now()
        )
      );

      return { processed, failed, matchedSkus, error: null };
    });
  } catch (error) {
    return {
      processed: 0,
      failed: items.length,
      matchedSkus: new Set<string>(),
      error: new BatchProcessingError({
        batchIndex,
        itemIds: items.map((item) => item.id),
        cause: error,
      }),
    };
  }
}
