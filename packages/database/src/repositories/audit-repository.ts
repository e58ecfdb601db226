import { ALERT_THRESHOLD } from '@app/reconciler';
import type { AuditStore, AuditTotals } from '@app/reconciler';
import type { ReconciliationLogEntry } from '@app/types';

import type { DbExecutor } from '../db.js';

type LogEntryDbRow = {
  sku: string;
  barcode: string | null;
  external_id: string | null;
  brand: string | null;
  resolved_quantity: number;
  alert_flag: boolean;
  note: string;
};

type TotalsDbRow = {
  log_entries: number;
  alerts: number;
  high_stock: number;
  unpublished: number;
};

export function createAuditRepository(db: DbExecutor): AuditStore {
  return {
    clearPreviousRun() {
      return db.transaction(async (client) => {
        const logEntries = await client.query('DELETE FROM reconciliation_log_entries');
        const unpublished = await client.query('DELETE FROM unpublished_product_entries');
        return { logEntries: logEntries.rowCount, unpublishedEntries: unpublished.rowCount };
      });
    },

    async totals(): Promise<AuditTotals> {
      const result = await db.query<TotalsDbRow>(
        `SELECT
           (SELECT count(*)::int FROM reconciliation_log_entries) AS log_entries,
           (SELECT count(*)::int FROM reconciliation_log_entries WHERE alert_flag) AS alerts,
           (SELECT count(*)::int FROM reconciliation_log_entries
             WHERE NOT alert_flag AND resolved_quantity >= $1) AS high_stock,
           (SELECT count(*)::int FROM unpublished_product_entries) AS unpublished`,
        [ALERT_THRESHOLD]
      );
      const row = result.rows[0];
      return {
        logEntries: row?.log_entries ?? 0,
        alerts: row?.alerts ?? 0,
        highStock: row?.high_stock ?? 0,
        unpublished: row?.unpublished ?? 0,
      };
    },

    async listLogEntries() {
      const result = await db.query<LogEntryDbRow>(
        `SELECT sku, barcode, external_id, brand, resolved_quantity, alert_flag, note
           FROM reconciliation_log_entries
          ORDER BY id`
      );
      return result.rows.map(
        (row): ReconciliationLogEntry => ({
          sku: row.sku,
          barcode: row.barcode,
          externalId: row.external_id,
          brand: row.brand,
          resolvedQuantity: row.resolved_quantity,
          alertFlag: row.alert_flag,
          note: row.note,
        })
      );
    },
  };
}
