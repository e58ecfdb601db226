import type { MissingProductPage, MissingProductStore } from '@app/reconciler';
import {
  MISSING_PRODUCT_STATUSES,
  type MissingProductRecord,
  type MissingProductStatus,
} from '@app/types';

import type { DbExecutor } from '../db.js';

type MissingProductDbRow = {
  id: string;
  sku: string;
  external_id: string | null;
  barcode: string | null;
  brand: string | null;
  quantity: number;
  first_seen_at: Date;
  last_sync_at: Date;
  status: string;
  note: string | null;
};

const COLUMNS =
  'id, sku, external_id, barcode, brand, quantity, first_seen_at, last_sync_at, status, note';

function parseStatus(value: string): MissingProductStatus {
  const status = MISSING_PRODUCT_STATUSES.find((candidate) => candidate === value);
  if (!status) throw new Error(`Unknown missing product status: ${value}`);
  return status;
}

export function toMissingProductRecord(row: MissingProductDbRow): MissingProductRecord {
  return {
    id: row.id,
    sku: row.sku,
    externalId: row.external_id,
    barcode: row.barcode,
    brand: row.brand,
    quantity: row.quantity,
    firstSeenAt: row.first_seen_at,
    lastSyncAt: row.last_sync_at,
    status: parseStatus(row.status),
    note: row.note,
  };
}

function firstRecord(rows: MissingProductDbRow[], context: string): MissingProductRecord {
  const row = rows[0];
  if (!row) throw new Error(`Missing product ${context} returned no row`);
  return toMissingProductRecord(row);
}

export function createMissingProductRepository(db: DbExecutor): MissingProductStore {
  return {
    async findById(id) {
      const result = await db.query<MissingProductDbRow>(
        `SELECT ${COLUMNS} FROM missing_product_records WHERE id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? toMissingProductRecord(row) : null;
    },

    async findOpenBySku(sku) {
      const result = await db.query<MissingProductDbRow>(
        `SELECT ${COLUMNS} FROM missing_product_records
          WHERE sku = $1 AND status = 'missing'
          LIMIT 1`,
        [sku]
      );
      const row = result.rows[0];
      return row ? toMissingProductRecord(row) : null;
    },

    async findBySku(sku, status) {
      const result = await db.query<MissingProductDbRow>(
        `SELECT ${COLUMNS} FROM missing_product_records
          WHERE sku = $1 AND status = $2
          ORDER BY first_seen_at
          LIMIT 1`,
        [sku, status]
      );
      const row = result.rows[0];
      return row ? toMissingProductRecord(row) : null;
    },

    async create(record) {
      const result = await db.query<MissingProductDbRow>(
        `INSERT INTO missing_product_records
           (sku, external_id, barcode, brand, quantity, first_seen_at, last_sync_at, status, note)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${COLUMNS}`,
        [
          record.sku,
          record.externalId,
          record.barcode,
          record.brand,
          record.quantity,
          record.firstSeenAt,
          record.lastSyncAt,
          record.status,
          record.note,
        ]
      );
      return firstRecord(result.rows, 'insert');
    },

    async refresh(id, update) {
      await db.query(
        `UPDATE missing_product_records
            SET last_sync_at = $2, quantity = $3, note = $4
          WHERE id = $1`,
        [id, update.lastSyncAt, update.quantity, update.note]
      );
    },

    async updateStatus(id, status, note) {
      const result = await db.query<MissingProductDbRow>(
        `UPDATE missing_product_records SET status = $2, note = $3
          WHERE id = $1 AND status = 'missing'
          RETURNING ${COLUMNS}`,
        [id, status, note]
      );
      const row = result.rows[0];
      return row ? toMissingProductRecord(row) : null;
    },

    async purgeStale(cutoff) {
      const result = await db.query(
        `DELETE FROM missing_product_records WHERE status = 'missing' AND first_seen_at < $1`,
        [cutoff]
      );
      return result.rowCount;
    },

    async purgeAllMissing() {
      const result = await db.query(`DELETE FROM missing_product_records WHERE status = 'missing'`);
      return result.rowCount;
    },

    async countOpen() {
      const result = await db.query<{ count: number }>(
        `SELECT count(*)::int AS count FROM missing_product_records WHERE status = 'missing'`
      );
      return result.rows[0]?.count ?? 0;
    },

    async list({ status, page, limit }): Promise<MissingProductPage> {
      const filter = status ?? null;
      const [rows, total] = await Promise.all([
        db.query<MissingProductDbRow>(
          `SELECT ${COLUMNS} FROM missing_product_records
            WHERE ($1::text IS NULL OR status = $1)
            ORDER BY last_sync_at DESC, id
            LIMIT $2 OFFSET $3`,
          [filter, limit, (page - 1) * limit]
        ),
        db.query<{ count: number }>(
          `SELECT count(*)::int AS count FROM missing_product_records
            WHERE ($1::text IS NULL OR status = $1)`,
          [filter]
        ),
      ]);
      return {
        items: rows.rows.map(toMissingProductRecord),
        total: total.rows[0]?.count ?? 0,
      };
    },
  };
}
