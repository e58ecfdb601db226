import { emptyRunCounters, type RunStore, type StoredRun } from '@app/reconciler';
import type {
  ReconcileRunCounters,
  ReconcileRunStatus,
  ReconcileRunSummary,
  ReconcileTriggeredBy,
} from '@app/types';

import type { DbExecutor } from '../db.js';

type RunDbRow = {
  id: string;
  status: string;
  message: string;
  triggered_by: string;
  started_at: Date;
  finished_at: Date | null;
  counters: unknown;
  checkpoint: unknown;
};

const COLUMNS = 'id, status, message, triggered_by, started_at, finished_at, counters, checkpoint';

const RUN_STATUSES: readonly ReconcileRunStatus[] = ['running', 'success', 'fail'];
const TRIGGERS: readonly ReconcileTriggeredBy[] = ['manual', 'scheduler', 'system'];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Unknown keys are ignored; missing or non-numeric counters read as 0. */
export function readCounters(raw: unknown): ReconcileRunCounters {
  if (!isObject(raw)) return emptyRunCounters();
  const read = (key: keyof ReconcileRunCounters): number => {
    const value = raw[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
  };
  return {
    totalItems: read('totalItems'),
    processed: read('processed'),
    failed: read('failed'),
    batches: read('batches'),
    failedBatches: read('failedBatches'),
    feedRecords: read('feedRecords'),
    feedRowsSkipped: read('feedRowsSkipped'),
    missingCreated: read('missingCreated'),
    missingIgnored: read('missingIgnored'),
    missingRefreshed: read('missingRefreshed'),
    missingSkippedByFilter: read('missingSkippedByFilter'),
  };
}

function parseOne<T extends string>(allowed: readonly T[], value: string, label: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (!found) throw new Error(`Unknown ${label}: ${value}`);
  return found;
}

export function toRunSummary(row: RunDbRow): ReconcileRunSummary {
  return {
    runId: row.id,
    status: parseOne(RUN_STATUSES, row.status, 'run status'),
    message: row.message,
    triggeredBy: parseOne(TRIGGERS, row.triggered_by, 'run trigger'),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    counters: readCounters(row.counters),
  };
}

function firstSummary(rows: RunDbRow[], context: string): ReconcileRunSummary {
  const row = rows[0];
  if (!row) throw new Error(`Run ${context} returned no row`);
  return toRunSummary(row);
}

export function createRunRepository(db: DbExecutor): RunStore {
  return {
    async createRun({ triggeredBy, startedAt }) {
      const result = await db.query<RunDbRow>(
        `INSERT INTO reconciliation_runs (status, message, triggered_by, started_at, counters)
         VALUES ('running', '', $1, $2, $3::jsonb)
         RETURNING ${COLUMNS}`,
        [triggeredBy, startedAt, JSON.stringify(emptyRunCounters())]
      );
      return firstSummary(result.rows, 'insert');
    },

    async findRun(id): Promise<StoredRun | null> {
      const result = await db.query<RunDbRow>(
        `SELECT ${COLUMNS} FROM reconciliation_runs WHERE id = $1`,
        [id]
      );
      const row = result.rows[0];
      return row ? { summary: toRunSummary(row), checkpoint: row.checkpoint } : null;
    },

    async finalizeRun(id, { status, message, counters, finishedAt }) {
      const result = await db.query<RunDbRow>(
        `UPDATE reconciliation_runs
            SET status = $2, message = $3, counters = $4::jsonb, finished_at = $5, updated_at = now()
          WHERE id = $1
          RETURNING ${COLUMNS}`,
        [id, status, message, JSON.stringify(counters), finishedAt]
      );
      return firstSummary(result.rows, 'update');
    },

    async latestRun() {
      const result = await db.query<RunDbRow>(
        `SELECT ${COLUMNS} FROM reconciliation_runs ORDER BY started_at DESC, id DESC LIMIT 1`
      );
      const row = result.rows[0];
      return row ? toRunSummary(row) : null;
    },
  };
}
