import type { ReconcileTriggeredBy } from './reconcile.js';

export interface ReconcileJobPayload {
  triggeredBy: ReconcileTriggeredBy;
  requestedAt: number;
  /** Set by the worker once the run record exists, so a retried job resumes the same run. */
  runId?: string;
}

function isCanonicalUuid(value: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/.test(value);
}

export function validateReconcileJobPayload(data: unknown): data is ReconcileJobPayload {
  if (!data || typeof data !== 'object') return false;
  const job = data as Partial<ReconcileJobPayload>;

  if (
    job.triggeredBy !== 'manual' &&
    job.triggeredBy !== 'scheduler' &&
    job.triggeredBy !== 'system'
  ) {
    return false;
  }

  if (typeof job.requestedAt !== 'number' || !Number.isFinite(job.requestedAt)) return false;
  if (job.runId !== undefined) {
    if (typeof job.runId !== 'string' || !isCanonicalUuid(job.runId)) return false;
  }

  return true;
}
