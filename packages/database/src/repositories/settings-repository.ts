import { formatPrefixList, parseFailureIsolation, parsePrefixList } from '@app/config';
import type { SettingsStore } from '@app/reconciler';
import type { ReconcileSettings } from '@app/types';

import type { DbExecutor } from '../db.js';

type SettingsDbRow = {
  prefix_filter_enabled: boolean;
  allowed_prefixes: string;
  notifications_enabled: boolean;
  recipient_email: string | null;
  batch_size: number;
  isolation: string;
  missing_retention_hours: number;
};

const COLUMNS =
  'prefix_filter_enabled, allowed_prefixes, notifications_enabled, recipient_email, batch_size, isolation, missing_retention_hours';

export function toReconcileSettings(row: SettingsDbRow): ReconcileSettings {
  return {
    prefixFilterEnabled: row.prefix_filter_enabled,
    allowedPrefixes: parsePrefixList(row.allowed_prefixes),
    notificationsEnabled: row.notifications_enabled,
    recipientEmail: row.recipient_email,
    batchSize: row.batch_size,
    isolation: parseFailureIsolation(row.isolation),
    missingRetentionHours: row.missing_retention_hours,
  };
}

/**
 * Settings live in a single row (id = 1). Until the first save, `defaults` are returned.
 */
export function createSettingsRepository(
  db: DbExecutor,
  defaults: ReconcileSettings
): SettingsStore {
  async function load(): Promise<ReconcileSettings> {
    const result = await db.query<SettingsDbRow>(
      `SELECT ${COLUMNS} FROM reconcile_settings WHERE id = 1`
    );
    const row = result.rows[0];
    return row ? toReconcileSettings(row) : { ...defaults };
  }

  return {
    load,

    async save(update) {
      const next: ReconcileSettings = { ...(await load()), ...update };
      const result = await db.query<SettingsDbRow>(
        `INSERT INTO reconcile_settings (id, ${COLUMNS}, updated_at)
         VALUES (1, $1, $2, $3, $4, $5, $6, $7, now())
         ON CONFLICT (id) DO UPDATE SET
           prefix_filter_enabled = EXCLUDED.prefix_filter_enabled,
           allowed_prefixes = EXCLUDED.allowed_prefixes,
           notifications_enabled = EXCLUDED.notifications_enabled,
           recipient_email = EXCLUDED.recipient_email,
           batch_size = EXCLUDED.batch_size,
           isolation = EXCLUDED.isolation,
           missing_retention_hours = EXCLUDED.missing_retention_hours,
           updated_at = now()
         RETURNING ${COLUMNS}`,
        [
          next.prefixFilterEnabled,
          formatPrefixList(next.allowedPrefixes),
          next.notificationsEnabled,
          next.recipientEmail,
          next.batchSize,
          next.isolation,
          next.missingRetentionHours,
        ]
      );
      const row = result.rows[0];
      return row ? toReconcileSettings(row) : next;
    },
  };
}
