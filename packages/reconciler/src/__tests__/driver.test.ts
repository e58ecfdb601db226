import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createNoopLogger } from '@app/logger';

import { readDriverCheckpoint } from '../checkpoint.js';
import {
  effectiveBatchSize,
  interBatchDelayMs,
  processBatch,
  runChunkedReconciliation,
  type DriverOptions,
} from '../driver.js';
import { BatchProcessingError, ItemLookupError } from '../errors.js';
import { buildFeedIndex, type FeedIndex } from '../feed-ingestor.js';
import { isValidIdentifier } from '../normalizer.js';

import { MemoryStore, itemId, makeItem, type StoredItem } from './helpers/memory-store.js';

const logger = createNoopLogger();
const delays = { normalMs: 1_000, largeMs: 2_000 };

function sku(n: number): string {
  return `SKU-${String(n).padStart(4, '0')}`;
}

function inventory(count: number): StoredItem[] {
  return Array.from({ length: count }, (_, i) =>
    makeItem(itemId(i + 1), { sku: sku(i + 1), barcode: `BC${i + 1}`, quantityOnHand: 0 })
  );
}

function feedFor(count: number): FeedIndex {
  return buildFeedIndex(
    Array.from({ length: count }, (_, i) => ({
      sku: sku(i + 1),
      barcode: `BC${i + 1}`,
      itemNumber: `EXT-${i + 1}`,
      southbayStock: 100,
    }))
  ).index;
}

function harness(store: MemoryStore, index: FeedIndex, overrides: Partial<DriverOptions> = {}) {
  const sleeps: number[] = [];
  const options: DriverOptions = {
    runId: 'run-1',
    store,
    index,
    logger,
    batchSize: 100,
    delays,
    sleep: (ms) => {
      sleeps.push(ms);
      return Promise.resolve();
    },
    ...overrides,
  };
  return { sleeps, run: () => runChunkedReconciliation(options) };
}

void describe('effectiveBatchSize', () => {
  void it('keeps the requested size for small inventories', () => {
    assert.equal(effectiveBatchSize(100, 5_000), 100);
    assert.equal(effectiveBatchSize(250, 10), 250);
  });

  void it('caps at 100 above 5000 items and at 80 above 8000', () => {
    assert.equal(effectiveBatchSize(250, 5_001), 100);
    assert.equal(effectiveBatchSize(100, 8_000), 100);
    assert.equal(effectiveBatchSize(100, 8_001), 80);
  });

  void it('never increases the requested size', () => {
    assert.equal(effectiveBatchSize(25, 9_000), 25);
    assert.equal(effectiveBatchSize(60, 6_000), 60);
  });
});

void describe('interBatchDelayMs', () => {
  void it('uses the large delay above 8000 items', () => {
    assert.equal(interBatchDelayMs(8_000, delays), 1_000);
    assert.equal(interBatchDelayMs(8_001, delays), 2_000);
  });
});

void describe('runChunkedReconciliation', () => {
  void it('processes every item in keyset batches with a delay between them', async () => {
    const store = new MemoryStore(inventory(250));
    const { sleeps, run } = harness(store, feedFor(250));

    const result = await run();

    assert.equal(result.totalItems, 250);
    assert.equal(result.processed, 250);
    assert.equal(result.failed, 0);
    assert.equal(result.batches, 3);
    assert.equal(result.matchedSkus.size, 250);
    assert.deepEqual(
      store.listCalls.map((call) => call.afterId),
      [null, itemId(100), itemId(200)]
    );
    assert.deepEqual(sleeps, [1_000, 1_000]);
    assert.equal(store.state.logEntries.length, 250);
    assert.equal(store.item(itemId(1)).quantityOnHand, 5);
    assert.equal(store.item(itemId(250)).isPublished, true);
  });

  void it('fails the whole batch when item #47 throws and carries on', async () => {
    const store = new MemoryStore(inventory(300));
    store.failOnLogSkus.add(sku(47));
    const { run } = harness(store, feedFor(300));

    const result = await run();

    assert.equal(result.batches, 3);
    assert.equal(result.failedBatches, 1);
    assert.equal(result.failed, 100);
    assert.equal(result.processed, 200);
    assert.equal(result.cancelled, false);
    assert.equal(store.state.logEntries.length, 200);
    assert.equal(store.item(itemId(1)).quantityOnHand, 0);
    assert.equal(store.item(itemId(46)).isPublished, false);
    assert.equal(store.item(itemId(101)).quantityOnHand, 5);
    assert.equal(result.matchedSkus.has('SKU0001'), false);
    assert.equal(result.matchedSkus.has('SKU0101'), true);
    assert.equal(store.state.adjustments.length, 200);

    const afterFailure = store.checkpointWrites[0];
    assert.equal(afterFailure?.lastItemId, itemId(100));
    assert.equal(afterFailure?.failed, 100);
    assert.equal(afterFailure?.failedBatches, 1);
  });

  void it('isolates a failing item in item mode', async () => {
    const store = new MemoryStore(inventory(300));
    store.failOnLogSkus.add(sku(47));
    const { run } = harness(store, feedFor(300), { isolation: 'item' });

    const result = await run();

    assert.equal(result.failedBatches, 0);
    assert.equal(result.failed, 1);
    assert.equal(result.processed, 299);
    assert.equal(store.state.logEntries.length, 299);
    assert.equal(store.item(itemId(47)).quantityOnHand, 0);
    assert.equal(store.item(itemId(47)).isPublished, false);
    assert.equal(store.item(itemId(46)).quantityOnHand, 5);
    assert.equal(store.item(itemId(48)).quantityOnHand, 5);
  });

  void it('holds the publish invariant for every processed item', async () => {
    const store = new MemoryStore([
      makeItem(itemId(1), { sku: 'A-1', barcode: '1', isPublished: false }),
      makeItem(itemId(2), { sku: 'A-2', barcode: null, isPublished: true }),
      makeItem(itemId(3), { sku: 'none', barcode: '3', isPublished: true }),
      makeItem(itemId(4), { sku: null, barcode: 'N/A', isPublished: true }),
      makeItem(itemId(5), { sku: 'LOCAL', barcode: 'L5', isPublished: false }),
    ]);
    const index = buildFeedIndex([{ sku: 'A-1', barcode: '1', southbayStock: 60 }]).index;
    const { run } = harness(store, index);

    await run();

    for (const item of store.state.items.values()) {
      assert.equal(
        item.isPublished,
        isValidIdentifier(item.sku) && isValidIdentifier(item.barcode),
        `publish flag of ${item.id}`
      );
    }
    assert.equal(store.state.unpublished.length, 3);
  });

  void it('reduces the batch size and lengthens the delay for huge inventories', async () => {
    class HugeStore extends MemoryStore {
      override countReconcilableItems(): Promise<number> {
        return Promise.resolve(9_000);
      }
    }
    const store = new HugeStore(inventory(200));
    const { sleeps, run } = harness(store, feedFor(200));

    const result = await run();

    assert.equal(result.batchSize, 80);
    assert.deepEqual(
      store.listCalls.map((call) => call.limit),
      [80, 80, 80]
    );
    assert.deepEqual(sleeps, [2_000, 2_000]);
    assert.equal(result.processed, 200);
  });

  void it('resumes after the checkpointed item with its counters', async () => {
    const store = new MemoryStore(inventory(300));
    const resumeFrom = readDriverCheckpoint({
      version: 1,
      lastItemId: itemId(100),
      processed: 100,
      failed: 0,
      batches: 1,
      failedBatches: 0,
      matchedSkus: ['SKU0001'],
      updatedAtIso: '2026-01-05T10:00:00.000Z',
    });
    const { run } = harness(store, feedFor(300), { resumeFrom });

    const result = await run();

    assert.equal(store.listCalls[0]?.afterId, itemId(100));
    assert.equal(result.processed, 300);
    assert.equal(result.batches, 3);
    assert.equal(result.matchedSkus.size, 201);
    assert.equal(store.item(itemId(1)).quantityOnHand, 0);
    assert.equal(store.item(itemId(101)).quantityOnHand, 5);
    assert.equal(store.state.logEntries.length, 200);
  });

  void it('stops between batches when aborted', async () => {
    const store = new MemoryStore(inventory(300));
    const controller = new AbortController();
    const { run } = harness(store, feedFor(300), {
      signal: controller.signal,
      onProgress: (progress) => {
        if (progress.batchIndex === 1) controller.abort();
      },
    });

    const result = await run();

    assert.equal(result.cancelled, true);
    assert.equal(result.batches, 1);
    assert.equal(result.processed, 100);
    assert.equal(result.notAttempted, 200);
    assert.equal(store.listCalls.length, 1);
  });

  void it('reports progress after every batch', async () => {
    const store = new MemoryStore(inventory(150));
    const seen: Array<[number, number]> = [];
    const { run } = harness(store, feedFor(150), {
      onProgress: (progress) => {
        seen.push([progress.batchIndex, progress.processed]);
      },
    });

    await run();

    assert.deepEqual(seen, [
      [1, 100],
      [2, 150],
    ]);
  });
});

void describe('processBatch', () => {
  void it('returns a typed failure when an item vanished from the store', async () => {
    const store = new MemoryStore();
    const ghost = makeItem('ghost', { sku: sku(1), barcode: 'BC1', quantityOnHand: 0 });

    const result = await processBatch({
      runId: 'run-1',
      store,
      index: feedFor(1),
      items: [ghost],
      batchIndex: 4,
      isolation: 'batch',
      state: {
        processed: 0,
        failed: 0,
        batches: 3,
        failedBatches: 0,
        matchedSkus: new Set(),
        lastItemId: null,
      },
      logger,
      now: () => new Date('2026-01-05T10:00:00.000Z'),
    });

    assert.equal(result.processed, 0);
    assert.equal(result.failed, 1);
    assert.ok(result.error instanceof BatchProcessingError);
    assert.equal(result.error.batchIndex, 4);
    assert.deepEqual(result.error.itemIds, ['ghost']);
    assert.ok(result.error.cause instanceof ItemLookupError);
    assert.equal(store.state.logEntries.length, 0);
  });
});

void describe('readDriverCheckpoint', () => {
  void it('rejects unknown versions and malformed payloads', () => {
    assert.equal(readDriverCheckpoint(null), null);
    assert.equal(readDriverCheckpoint({ version: 2 }), null);
    assert.equal(
      readDriverCheckpoint({
        version: 1,
        lastItemId: 7,
        processed: 1,
        failed: 0,
        batches: 1,
        failedBatches: 0,
        matchedSkus: [],
        updatedAtIso: '2026-01-05T10:00:00.000Z',
      }),
      null
    );
  });

  void it('clamps counters to non-negative integers', () => {
    const checkpoint = readDriverCheckpoint({
      version: 1,
      lastItemId: null,
      processed: 10.7,
      failed: -2,
      batches: 1,
      failedBatches: 0,
      matchedSkus: ['A'],
      updatedAtIso: '2026-01-05T10:00:00.000Z',
    });
    assert.equal(checkpoint?.processed, 10);
    assert.equal(checkpoint?.failed, 0);
  });
});
