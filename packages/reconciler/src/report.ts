import type { ReconcileOverview, ReconcileRunSummary } from '@app/types';

import type { AuditStore, MissingProductStore, RunReport, RunStore } from './ports.js';

export async function buildRunReport(
  summary: ReconcileRunSummary,
  stores: Readonly<{ audit: AuditStore; missing: MissingProductStore }>
): Promise<RunReport> {
  const [totals, openMissing, entries] = await Promise.all([
    stores.audit.totals(),
    stores.missing.countOpen(),
    stores.audit.listLogEntries(),
  ]);

  return {
    runId: summary.runId,
    status: summary.status,
    message: summary.message,
    triggeredBy: summary.triggeredBy,
    startedAt: summary.startedAt.toISOString(),
    finishedAt: summary.finishedAt ? summary.finishedAt.toISOString() : null,
    counters: summary.counters,
    totals: {
      logEntries: totals.logEntries,
      alerts: totals.alerts,
      highStock: totals.highStock,
      missing: openMissing,
      unpublished: totals.unpublished,
    },
    entries,
  };
}

export function reportSubject(report: Pick<RunReport, 'status' | 'startedAt' | 'totals'>): string {
  const day = report.startedAt.slice(0, 10);
  const outcome = report.status === 'success' ? 'completed' : 'failed';
  return `Stock reconciliation ${outcome} ${day}: ${report.totals.alerts} alerts, ${report.totals.missing} missing`;
}

export async function buildOverview(
  stores: Readonly<{ audit: AuditStore; missing: MissingProductStore; runs: RunStore }>
): Promise<ReconcileOverview> {
  const [totals, openMissing, latestRun] = await Promise.all([
    stores.audit.totals(),
    stores.missing.countOpen(),
    stores.runs.latestRun(),
  ]);

  return {
    logEntries: totals.logEntries,
    alerts: totals.alerts,
    highStock: totals.highStock,
    openMissing,
    unpublished: totals.unpublished,
    latestRun,
  };
}
