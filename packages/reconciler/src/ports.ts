import type {
  DriverCheckpoint,
  InventoryItem,
  MissingProductRecord,
  MissingProductStatus,
  NewInventoryItem,
  NewMissingProductRecord,
  ReconcileRunCounters,
  ReconcileRunStatus,
  ReconcileRunSummary,
  ReconcileSettings,
  ReconcileTriggeredBy,
  ReconciliationLogEntry,
  UnpublishedProductEntry,
} from '@app/types';

// ============================================
// Feed transport
// ============================================

export type FeedResponse = Readonly<{
  status: number;
  body: string;
}>;

/** One HTTP GET against the feed. Timeouts surface as a rejected promise. */
export interface FeedTransport {
  fetch(signal?: AbortSignal): Promise<FeedResponse>;
}

// ============================================
// Inventory store
// ============================================

/**
 * Writes performed while one batch's transaction is open. Everything written through a session
 * commits or rolls back with the batch.
 */
export interface BatchSession {
  /** Sets on-hand quantity and records the adjustment. Throws ItemLookupError when the row is gone. */
  setOnHandQuantity(itemId: string, previousQuantity: number, newQuantity: number): Promise<void>;
  setPublished(itemId: string, published: boolean): Promise<void>;
  appendLogEntry(entry: ReconciliationLogEntry): Promise<void>;
  appendUnpublishedEntry(entry: UnpublishedProductEntry): Promise<void>;
  saveCheckpoint(runId: string, checkpoint: DriverCheckpoint): Promise<void>;
  /** Runs `fn` inside a nested savepoint; a rejection rolls back only its writes. */
  savepoint<T>(fn: () => Promise<T>): Promise<T>;
}

export type RelaxedSkuMatch = Readonly<{
  itemId: string;
  sku: string;
}>;

export interface InventoryStore {
  /** Non-service items, the reconciliation set. */
  countReconcilableItems(): Promise<number>;
  /** Keyset page of the reconciliation set ordered by id. */
  listReconcilableItems(params: { afterId: string | null; limit: number }): Promise<InventoryItem[]>;
  withBatch<T>(fn: (session: BatchSession) => Promise<T>): Promise<T>;
  /** SKU-only lookup ignoring punctuation and case, archived items included. */
  findBySkuRelaxed(sku: string): Promise<RelaxedSkuMatch | null>;
  createItem(item: NewInventoryItem): Promise<InventoryItem>;
}

// ============================================
// Exception stores
// ============================================

export type AuditTotals = Readonly<{
  logEntries: number;
  alerts: number;
  highStock: number;
  unpublished: number;
}>;

export interface AuditStore {
  clearPreviousRun(): Promise<{ logEntries: number; unpublishedEntries: number }>;
  totals(): Promise<AuditTotals>;
  listLogEntries(): Promise<ReconciliationLogEntry[]>;
}

export type MissingProductPage = Readonly<{
  items: MissingProductRecord[];
  total: number;
}>;

export interface MissingProductStore {
  findById(id: string): Promise<MissingProductRecord | null>;
  findOpenBySku(sku: string): Promise<MissingProductRecord | null>;
  findBySku(sku: string, status: MissingProductStatus): Promise<MissingProductRecord | null>;
  create(record: NewMissingProductRecord): Promise<MissingProductRecord>;
  refresh(id: string, update: { lastSyncAt: Date; quantity: number; note: string }): Promise<void>;
  /** Moves a `missing` record to `status`; null when the record is no longer `missing`. */
  updateStatus(
    id: string,
    status: Exclude<MissingProductStatus, 'missing'>,
    note: string
  ): Promise<MissingProductRecord | null>;
  /** Deletes `missing` records first seen before `cutoff`. */
  purgeStale(cutoff: Date): Promise<number>;
  /** Deletes every `missing` record. */
  purgeAllMissing(): Promise<number>;
  countOpen(): Promise<number>;
  list(params: { status?: MissingProductStatus; page: number; limit: number }): Promise<MissingProductPage>;
}

// ============================================
// Runs & settings
// ============================================

export type StoredRun = Readonly<{
  summary: ReconcileRunSummary;
  /** Raw checkpoint payload; validated by readDriverCheckpoint. */
  checkpoint: unknown;
}>;

export interface RunStore {
  createRun(params: { triggeredBy: ReconcileTriggeredBy; startedAt: Date }): Promise<ReconcileRunSummary>;
  findRun(id: string): Promise<StoredRun | null>;
  finalizeRun(
    id: string,
    result: {
      status: Exclude<ReconcileRunStatus, 'running'>;
      message: string;
      counters: ReconcileRunCounters;
      finishedAt: Date;
    }
  ): Promise<ReconcileRunSummary>;
  latestRun(): Promise<ReconcileRunSummary | null>;
}

export interface SettingsStore {
  load(): Promise<ReconcileSettings>;
  save(update: Partial<ReconcileSettings>): Promise<ReconcileSettings>;
}

// ============================================
// Report dispatch
// ============================================

export type RunReportTotals = Readonly<{
  logEntries: number;
  alerts: number;
  highStock: number;
  missing: number;
  unpublished: number;
}>;

export type RunReport = Readonly<{
  runId: string;
  status: ReconcileRunStatus;
  message: string;
  triggeredBy: ReconcileTriggeredBy;
  startedAt: string;
  finishedAt: string | null;
  counters: ReconcileRunCounters;
  totals: RunReportTotals;
  entries: ReconciliationLogEntry[];
}>;

export interface ReportDispatcher {
  dispatch(params: { recipient: string; report: RunReport }): Promise<void>;
}
