import type { MissingField } from './inventory.js';

// ============================================
// Per-run audit entries
// ============================================

export interface ReconciliationLogEntry {
  sku: string;
  barcode: string | null;
  externalId: string | null;
  brand: string | null;
  resolvedQuantity: number;
  alertFlag: boolean;
  note: string;
}

export interface UnpublishedProductEntry {
  sku: string;
  barcode: string | null;
  externalId: string | null;
  brand: string | null;
  quantity: number;
  missingFields: MissingField[];
  note: string;
}

// ============================================
// Missing products
// ============================================

export const MISSING_PRODUCT_STATUSES = ['missing', 'created', 'ignored'] as const;

export type MissingProductStatus = (typeof MISSING_PRODUCT_STATUSES)[number];

export interface MissingProductRecord {
  id: string;
  sku: string;
  externalId: string | null;
  barcode: string | null;
  brand: string | null;
  quantity: number;
  firstSeenAt: Date;
  lastSyncAt: Date;
  status: MissingProductStatus;
  note: string | null;
}

export type NewMissingProductRecord = Omit<MissingProductRecord, 'id'>;

// ============================================
// Settings
// ============================================

export type FailureIsolation = 'batch' | 'item';

export interface ReconcileSettings {
  prefixFilterEnabled: boolean;
  allowedPrefixes: string[];
  notificationsEnabled: boolean;
  recipientEmail: string | null;
  batchSize: number;
  isolation: FailureIsolation;
  /** `missing` records whose firstSeenAt is older than this are purged at run start. */
  missingRetentionHours: number;
}

// ============================================
// Runs
// ============================================

export type ReconcileTriggeredBy = 'manual' | 'scheduler' | 'system';

export type ReconcileRunStatus = 'running' | 'success' | 'fail';

export interface DriverCheckpoint {
  version: 1;
  /** Id of the last item whose batch was attempted (committed or counted failed). */
  lastItemId: string | null;
  processed: number;
  failed: number;
  batches: number;
  failedBatches: number;
  matchedSkus: string[];
  updatedAtIso: string;
}

export interface ReconcileRunCounters {
  totalItems: number;
  processed: number;
  failed: number;
  batches: number;
  failedBatches: number;
  feedRecords: number;
  feedRowsSkipped: number;
  missingCreated: number;
  missingIgnored: number;
  missingRefreshed: number;
  missingSkippedByFilter: number;
}

export interface ReconcileRunSummary {
  runId: string;
  status: ReconcileRunStatus;
  message: string;
  triggeredBy: ReconcileTriggeredBy;
  startedAt: Date;
  finishedAt: Date | null;
  counters: ReconcileRunCounters;
}

export interface ReconcileOverview {
  logEntries: number;
  alerts: number;
  highStock: number;
  openMissing: number;
  unpublished: number;
  latestRun: ReconcileRunSummary | null;
}
