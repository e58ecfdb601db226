import { sql } from 'drizzle-orm';
import {
  bigserial,
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';

/** Per-run audit trail; emptied when the next run starts. */
export const reconciliationLogEntries = pgTable('reconciliation_log_entries', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  sku: text('sku').notNull(),
  barcode: text('barcode'),
  externalId: text('external_id'),
  brand: text('brand'),
  resolvedQuantity: integer('resolved_quantity').notNull(),
  alertFlag: boolean('alert_flag').notNull(),
  note: text('note').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const unpublishedProductEntries = pgTable('unpublished_product_entries', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  sku: text('sku').notNull(),
  barcode: text('barcode'),
  externalId: text('external_id'),
  brand: text('brand'),
  // raw feed quantity
  quantity: doublePrecision('quantity').notNull(),
  missingFields: text('missing_fields').array().notNull(),
  note: text('note').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const missingProductRecords = pgTable(
  'missing_product_records',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    sku: text('sku').notNull(),
    externalId: text('external_id'),
    barcode: text('barcode'),
    brand: text('brand'),
    quantity: doublePrecision('quantity').notNull(),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).notNull(),
    lastSyncAt: timestamp('last_sync_at', { withTimezone: true }).notNull(),
    // missing | created | ignored
    status: text('status').notNull().default('missing'),
    note: text('note'),
  },
  (table) => [
    uniqueIndex('uq_missing_product_records_open_sku')
      .on(table.sku)
      .where(sql`${table.status} = 'missing'`),
    index('idx_missing_product_records_status').on(table.status, table.firstSeenAt),
  ]
);

export const reconciliationRuns = pgTable(
  'reconciliation_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    status: text('status').notNull().default('running'),
    message: text('message').notNull().default(''),
    triggeredBy: text('triggered_by').notNull(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    finishedAt: timestamp('finished_at', { withTimezone: true }),
    counters: jsonb('counters').notNull(),
    checkpoint: jsonb('checkpoint'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_reconciliation_runs_started').on(table.startedAt)]
);

/** Single-row table keyed by id = 1. */
export const reconcileSettings = pgTable('reconcile_settings', {
  id: integer('id').primaryKey().default(1),
  prefixFilterEnabled: boolean('prefix_filter_enabled').notNull(),
  allowedPrefixes: text('allowed_prefixes').notNull(),
  notificationsEnabled: boolean('notifications_enabled').notNull(),
  recipientEmail: text('recipient_email'),
  batchSize: integer('batch_size').notNull(),
  isolation: text('isolation').notNull(),
  missingRetentionHours: integer('missing_retention_hours').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type MissingProductRow = typeof missingProductRecords.$inferSelect;
export type ReconciliationRunRow = typeof reconciliationRuns.$inferSelect;
export type ReconcileSettingsRow = typeof reconcileSettings.$inferSelect;
