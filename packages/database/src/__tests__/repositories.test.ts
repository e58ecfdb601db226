import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ItemLookupError } from '@app/reconciler';
import type { ReconcileSettings } from '@app/types';

import {
  createAuditRepository,
  createInventoryRepository,
  createMissingProductRepository,
  createRunRepository,
  createSettingsRepository,
  readCounters,
} from '../repositories/index.js';

import { FakeDb } from './fake-db.js';

const ITEM_ID = '3f1c2a9e-0000-4000-8000-000000000001';

const defaults: ReconcileSettings = {
  prefixFilterEnabled: false,
  allowedPrefixes: ['GN', 'PD'],
  notificationsEnabled: false,
  recipientEmail: null,
  batchSize: 100,
  isolation: 'batch',
  missingRetentionHours: 24,
};

void describe('inventory repository', () => {
  void it('pages the reconcilable set by id and resolves isStockable from the item type', async () => {
    const db = new FakeDb(() => ({
      rows: [
        {
          id: ITEM_ID,
          name: 'Widget',
          sku: 'GN-1',
          barcode: '123',
          brand: 'Acme',
          quantity_on_hand: 2,
          item_type: 'consumable',
          is_published: true,
        },
      ],
    }));
    const repo = createInventoryRepository(db);

    const items = await repo.listReconcilableItems({ afterId: 'prev-id', limit: 80 });

    assert.deepEqual(items, [
      {
        id: ITEM_ID,
        name: 'Widget',
        sku: 'GN-1',
        barcode: '123',
        brand: 'Acme',
        quantityOnHand: 2,
        isStockable: false,
        isPublished: true,
      },
    ]);
    assert.deepEqual(db.calls[0]?.values, ['prev-id', 80]);
    assert.match(db.calls[0]?.text ?? '', /item_type <> 'service' AND active/);
    assert.match(db.calls[0]?.text ?? '', /ORDER BY id LIMIT \$2$/);
  });

  void it('records a stock adjustment in the batch transaction', async () => {
    const db = new FakeDb(() => ({ rowCount: 1 }));
    const repo = createInventoryRepository(db);

    await repo.withBatch((session) => session.setOnHandQuantity(ITEM_ID, 0, 5));

    assert.deepEqual(db.statements(), [
      'BEGIN',
      'UPDATE inventory_items SET',
      'INSERT INTO stock_adjustments',
      'COMMIT',
    ]);
    assert.deepEqual(db.calls[2]?.values, [ITEM_ID, 0, 5]);
  });

  void it('raises ItemLookupError and rolls back when the item row is gone', async () => {
    const db = new FakeDb(() => ({ rowCount: 0 }));
    const repo = createInventoryRepository(db);

    await assert.rejects(
      repo.withBatch((session) => session.setOnHandQuantity(ITEM_ID, 0, 5)),
      (error: unknown) => error instanceof ItemLookupError && error.itemId === ITEM_ID
    );
    assert.deepEqual(db.statements(), ['BEGIN', 'UPDATE inventory_items SET', 'ROLLBACK']);
  });

  void it('rolls back only the savepoint when an item fails', async () => {
    const db = new FakeDb(() => ({ rowCount: 1 }));
    const repo = createInventoryRepository(db);

    await repo.withBatch(async (session) => {
      await session
        .savepoint(() => Promise.reject(new Error('bad item')))
        .catch((error: unknown) => {
          assert.ok(error instanceof Error);
        });
      await session.savepoint(() => session.setPublished(ITEM_ID, true));
    });

    assert.deepEqual(db.statements(), [
      'BEGIN',
      'SAVEPOINT reconcile_item_1',
      'ROLLBACK TO SAVEPOINT',
      'SAVEPOINT reconcile_item_2',
      'UPDATE inventory_items SET',
      'RELEASE SAVEPOINT reconcile_item_2',
      'COMMIT',
    ]);
  });

  void it('matches SKUs on the relaxed key', async () => {
    const db = new FakeDb(() => ({ rows: [{ id: ITEM_ID, sku: 'AB100' }] }));
    const repo = createInventoryRepository(db);

    const match = await repo.findBySkuRelaxed('ab-100');

    assert.deepEqual(match, { itemId: ITEM_ID, sku: 'AB100' });
    assert.deepEqual(db.calls[0]?.values, ['AB100']);
    assert.match(db.calls[0]?.text ?? '', /upper\(regexp_replace\(sku/);
  });

  void it('returns null when nothing matches', async () => {
    const repo = createInventoryRepository(new FakeDb());
    assert.equal(await repo.findBySkuRelaxed('---'), null);
  });
});

void describe('audit repository', () => {
  void it('clears both audit tables in one transaction', async () => {
    const db = new FakeDb((query) => ({
      rowCount: query.text.includes('reconciliation_log_entries') ? 12 : 3,
    }));
    const repo = createAuditRepository(db);

    const cleared = await repo.clearPreviousRun();

    assert.deepEqual(cleared, { logEntries: 12, unpublishedEntries: 3 });
    assert.equal(db.calls[0]?.text, 'BEGIN');
    assert.equal(db.calls[3]?.text, 'COMMIT');
  });

  void it('reads totals with the alert threshold bound', async () => {
    const db = new FakeDb(() => ({
      rows: [{ log_entries: 10, alerts: 4, high_stock: 6, unpublished: 2 }],
    }));

    const totals = await createAuditRepository(db).totals();

    assert.deepEqual(totals, { logEntries: 10, alerts: 4, highStock: 6, unpublished: 2 });
    assert.deepEqual(db.calls[0]?.values, [5]);
  });
});

void describe('missing product repository', () => {
  const row = {
    id: 'a1b2c3d4-0000-4000-8000-000000000002',
    sku: 'GN-100',
    external_id: 'E1',
    barcode: null,
    brand: 'Acme',
    quantity: 12.5,
    first_seen_at: new Date('2026-01-05T10:00:00.000Z'),
    last_sync_at: new Date('2026-01-05T11:00:00.000Z'),
    status: 'missing',
    note: 'n',
  };

  void it('lists a page with its total', async () => {
    const db = new FakeDb((query) =>
      query.text.startsWith('SELECT count') ? { rows: [{ count: 7 }] } : { rows: [row] }
    );

    const page = await createMissingProductRepository(db).list({
      status: 'missing',
      page: 3,
      limit: 2,
    });

    assert.equal(page.total, 7);
    assert.equal(page.items[0]?.externalId, 'E1');
    assert.equal(page.items[0]?.quantity, 12.5);
    assert.deepEqual(db.calls[0]?.values, ['missing', 2, 4]);
  });

  void it('rejects rows with an unknown status', async () => {
    const db = new FakeDb(() => ({ rows: [{ ...row, status: 'archived' }] }));

    await assert.rejects(
      createMissingProductRepository(db).findById(row.id),
      /Unknown missing product status: archived/
    );
  });

  void it('purges only open records older than the cutoff', async () => {
    const db = new FakeDb(() => ({ rowCount: 4 }));
    const cutoff = new Date('2026-01-04T10:00:00.000Z');

    const purged = await createMissingProductRepository(db).purgeStale(cutoff);

    assert.equal(purged, 4);
    assert.equal(
      db.calls[0]?.text,
      "DELETE FROM missing_product_records WHERE status = 'missing' AND first_seen_at < $1"
    );
    assert.deepEqual(db.calls[0]?.values, [cutoff]);
  });

  void it('looks up a record by SKU and status', async () => {
    const db = new FakeDb(() => ({ rows: [{ ...row, sku: 'AB-100', status: 'ignored' }] }));

    const found = await createMissingProductRepository(db).findBySku('AB-100', 'ignored');

    assert.equal(found?.status, 'ignored');
    assert.deepEqual(db.calls[0]?.values, ['AB-100', 'ignored']);
  });

  void it('updates status only while the record is still missing', async () => {
    const db = new FakeDb(() => ({ rows: [] }));

    const updated = await createMissingProductRepository(db).updateStatus(
      row.id,
      'created',
      'Product created'
    );

    assert.equal(updated, null);
    assert.ok(db.calls[0]?.text.includes("WHERE id = $1 AND status = 'missing'"));
  });
});

void describe('run repository', () => {
  void it('reads stored counters leniently', () => {
    const counters = readCounters({ processed: 10, failed: 'x', batches: 2, extra: 1 });
    assert.equal(counters.processed, 10);
    assert.equal(counters.failed, 0);
    assert.equal(counters.batches, 2);
    assert.equal(counters.totalItems, 0);
    assert.deepEqual(readCounters(null), readCounters({}));
  });

  void it('returns the stored checkpoint alongside the summary', async () => {
    const db = new FakeDb(() => ({
      rows: [
        {
          id: 'run-1',
          status: 'running',
          message: '',
          triggered_by: 'scheduler',
          started_at: new Date('2026-01-05T10:00:00.000Z'),
          finished_at: null,
          counters: { processed: 100 },
          checkpoint: { version: 1 },
        },
      ],
    }));

    const stored = await createRunRepository(db).findRun('run-1');

    assert.equal(stored?.summary.status, 'running');
    assert.equal(stored?.summary.triggeredBy, 'scheduler');
    assert.equal(stored?.summary.counters.processed, 100);
    assert.deepEqual(stored?.checkpoint, { version: 1 });
  });
});

void describe('settings repository', () => {
  void it('falls back to defaults until settings are saved', async () => {
    const settings = await createSettingsRepository(new FakeDb(), defaults).load();
    assert.deepEqual(settings, defaults);
  });

  void it('merges an update over the current settings and stores prefixes as CSV', async () => {
    const db = new FakeDb();
    const repo = createSettingsRepository(db, defaults);

    const saved = await repo.save({ prefixFilterEnabled: true, allowedPrefixes: ['LVL', 'LP'] });

    assert.deepEqual(saved, {
      ...defaults,
      prefixFilterEnabled: true,
      allowedPrefixes: ['LVL', 'LP'],
    });
    assert.deepEqual(db.calls[1]?.values, [true, 'LVL,LP', false, null, 100, 'batch', 24]);
  });
});
