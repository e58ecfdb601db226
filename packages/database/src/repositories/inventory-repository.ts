import { ItemLookupError, normalizeRelaxedSku } from '@app/reconciler';
import type { BatchSession, InventoryStore, RelaxedSkuMatch } from '@app/reconciler';
import type { InventoryItem, NewInventoryItem } from '@app/types';

import { withSavepoint, type DbClient, type DbExecutor } from '../db.js';

type InventoryItemDbRow = {
  id: string;
  name: string;
  sku: string | null;
  barcode: string | null;
  brand: string | null;
  quantity_on_hand: number;
  item_type: string;
  is_published: boolean;
};

const ITEM_COLUMNS = 'id, name, sku, barcode, brand, quantity_on_hand, item_type, is_published';

/** Non-service items, archived ones excluded. */
const RECONCILABLE = "item_type <> 'service' AND active";

/** Keep in sync with normalizeRelaxedSku and idx_inventory_items_sku_relaxed. */
const RELAXED_SKU_SQL = "upper(regexp_replace(sku, '[^0-9A-Za-z]+', '', 'g'))";

export function toInventoryItem(row: InventoryItemDbRow): InventoryItem {
  return {
    id: row.id,
    name: row.name,
    sku: row.sku,
    barcode: row.barcode,
    brand: row.brand,
    quantityOnHand: row.quantity_on_hand,
    isStockable: row.item_type === 'stockable',
    isPublished: row.is_published,
  };
}

function createBatchSession(client: DbClient): BatchSession {
  let savepoints = 0;

  return {
    async setOnHandQuantity(itemId, previousQuantity, newQuantity) {
      const updated = await client.query(
        `UPDATE inventory_items
            SET quantity_on_hand = $2, updated_at = now()
          WHERE id = $1`,
        [itemId, newQuantity]
      );
      if (updated.rowCount === 0) {
        throw new ItemLookupError(itemId, `Inventory item ${itemId} not found`);
      }
      await client.query(
        `INSERT INTO stock_adjustments (item_id, previous_quantity, new_quantity, reason)
         VALUES ($1, $2, $3, 'reconcile')`,
        [itemId, previousQuantity, newQuantity]
      );
    },

    async setPublished(itemId, published) {
      const updated = await client.query(
        `UPDATE inventory_items SET is_published = $2, updated_at = now() WHERE id = $1`,
        [itemId, published]
      );
      if (updated.rowCount === 0) {
        throw new ItemLookupError(itemId, `Inventory item ${itemId} not found`);
      }
    },

    async appendLogEntry(entry) {
      await client.query(
        `INSERT INTO reconciliation_log_entries
           (sku, barcode, external_id, brand, resolved_quantity, alert_flag, note)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          entry.sku,
          entry.barcode,
          entry.externalId,
          entry.brand,
          entry.resolvedQuantity,
          entry.alertFlag,
          entry.note,
        ]
      );
    },

    async appendUnpublishedEntry(entry) {
      await client.query(
        `INSERT INTO unpublished_product_entries
           (sku, barcode, external_id, brand, quantity, missing_fields, note)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          entry.sku,
          entry.barcode,
          entry.externalId,
          entry.brand,
          entry.quantity,
          entry.missingFields,
          entry.note,
        ]
      );
    },

    async saveCheckpoint(runId, checkpoint) {
      await client.query(
        `UPDATE reconciliation_runs SET checkpoint = $2::jsonb, updated_at = now() WHERE id = $1`,
        [runId, JSON.stringify(checkpoint)]
      );
    },

    savepoint(fn) {
      savepoints += 1;
      return withSavepoint(client, `reconcile_item_${savepoints}`, fn);
    },
  };
}

export function createInventoryRepository(db: DbExecutor): InventoryStore {
  return {
    async countReconcilableItems() {
      const result = await db.query<{ count: number }>(
        `SELECT count(*)::int AS count FROM inventory_items WHERE ${RECONCILABLE}`
      );
      return result.rows[0]?.count ?? 0;
    },

    async listReconcilableItems({ afterId, limit }) {
      const result = await db.query<InventoryItemDbRow>(
        `SELECT ${ITEM_COLUMNS}
           FROM inventory_items
          WHERE ${RECONCILABLE}
            AND ($1::uuid IS NULL OR id > $1::uuid)
          ORDER BY id
          LIMIT $2`,
        [afterId, limit]
      );
      return result.rows.map(toInventoryItem);
    },

    withBatch(fn) {
      return db.transaction((client) => fn(createBatchSession(client)));
    },

    async findBySkuRelaxed(sku): Promise<RelaxedSkuMatch | null> {
      const key = normalizeRelaxedSku(sku);
      const result = key
        ? await db.query<{ id: string; sku: string }>(
            `SELECT id, sku FROM inventory_items
              WHERE sku IS NOT NULL AND ${RELAXED_SKU_SQL} = $1
              ORDER BY id
              LIMIT 1`,
            [key]
          )
        : await db.query<{ id: string; sku: string }>(
            `SELECT id, sku FROM inventory_items WHERE sku = $1 ORDER BY id LIMIT 1`,
            [sku]
          );
      const row = result.rows[0];
      return row ? { itemId: row.id, sku: row.sku } : null;
    },

    async createItem(item: NewInventoryItem) {
      const result = await db.query<InventoryItemDbRow>(
        `INSERT INTO inventory_items (name, sku, barcode, brand, item_type)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${ITEM_COLUMNS}`,
        [item.name, item.sku, item.barcode, item.brand, item.itemType]
      );
      const row = result.rows[0];
      if (!row) throw new Error('Inventory insert returned no row');
      return toInventoryItem(row);
    },
  };
}
