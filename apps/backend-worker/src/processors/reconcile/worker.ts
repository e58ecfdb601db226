import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import {
  buildJobTelemetryFromActiveContext,
  createWorker,
  RECONCILE_JOB_NAMES,
  RECONCILE_MANUAL_JOB_ID,
  RECONCILE_QUEUE_NAME,
  RECONCILE_SCHEDULER_ID,
  type QueueManagerConfig,
} from '@app/queue-manager';
import type { ReconcileOrchestrator, SettingsStore } from '@app/reconciler';
import {
  validateReconcileJobPayload,
  type ReconcileJobPayload,
  type ReconcileRunSummary,
} from '@app/types';
import type { JobsOptions, RepeatOptions, Worker } from 'bullmq';

import type { ManualRunResult, RunTrigger } from '../../routes/reconcile.js';

/** The parts of a BullMQ job the processor touches. */
export interface ReconcileJob {
  id?: string | undefined;
  name: string;
  data: unknown;
  attemptsMade: number;
  updateData(data: ReconcileJobPayload): Promise<void>;
  updateProgress(progress: object): Promise<void>;
}

export type ReconcileJobDeps = Readonly<{
  orchestrator: Pick<ReconcileOrchestrator, 'run'>;
  settings: Pick<SettingsStore, 'load'>;
  logger: Logger;
}>;

/**
 * Runs one reconciliation for a queued job. Settings are read fresh for every run. The run id
 * is written back to the job so that a retried or stalled job resumes the same run.
 *
 * Runs that end in `fail` complete the job; only unexpected errors (store outages) reject and
 * go through the queue's retry policy.
 */
export async function processReconcileJob(
  job: ReconcileJob,
  signal: AbortSignal,
  deps: ReconcileJobDeps
): Promise<ReconcileRunSummary | null> {
  const logger = deps.logger.child({ jobId: job.id ?? null, jobName: job.name });

  if (!validateReconcileJobPayload(job.data)) {
    logger.warn({ data: job.data }, 'Dropping reconcile job with invalid payload');
    return null;
  }
  const payload = job.data;
  const settings = await deps.settings.load();

  const summary = await withSpan(
    'reconcile.job.process',
    {
      [OTEL_ATTR.QUEUE_NAME]: RECONCILE_QUEUE_NAME,
      [OTEL_ATTR.QUEUE_JOB_ID]: job.id ?? '',
      [OTEL_ATTR.QUEUE_JOB_NAME]: job.name,
      [OTEL_ATTR.QUEUE_ATTEMPTS_MADE]: job.attemptsMade,
    },
    () =>
      deps.orchestrator.run({
        settings,
        triggeredBy: payload.triggeredBy,
        signal,
        ...(payload.runId ? { resumeRunId: payload.runId } : {}),
        onRunStarted: async (runId) => {
          if (payload.runId !== runId) await job.updateData({ ...payload, runId });
        },
        onProgress: (progress) => job.updateProgress(progress),
      })
  );

  logger.info(
    { runId: summary.runId, status: summary.status, message: summary.message },
    'Reconcile job finished'
  );
  return summary;
}

// ============================================
// Producers
// ============================================

/** The parts of a BullMQ queue the producers use. */
export interface ReconcileQueue {
  getJob(jobId: string): Promise<
    | {
        getState(): Promise<string>;
        remove(): Promise<void>;
      }
    | undefined
  >;
  add(name: string, data: ReconcileJobPayload, opts?: JobsOptions): Promise<{ id?: string | undefined }>;
  upsertJobScheduler(
    jobSchedulerId: string,
    repeatOpts: Omit<RepeatOptions, 'key'>,
    jobTemplate?: { name?: string; data?: ReconcileJobPayload }
  ): Promise<unknown>;
}

const PENDING_STATES: ReadonlySet<string> = new Set([
  'waiting',
  'delayed',
  'prioritized',
  'waiting-children',
  'active',
]);

/**
 * Manual runs share one job id: while one is pending or running a new request returns it.
 * A finished job is removed first so that the id can be reused.
 */
export function createQueueRunTrigger(
  queue: ReconcileQueue,
  now: () => number = Date.now
): RunTrigger {
  return {
    async enqueueManualRun(): Promise<ManualRunResult> {
      const existing = await queue.getJob(RECONCILE_MANUAL_JOB_ID);
      if (existing) {
        const state = await existing.getState();
        if (PENDING_STATES.has(state)) {
          return { jobId: RECONCILE_MANUAL_JOB_ID, alreadyQueued: true };
        }
        await existing.remove();
      }

      const telemetry = buildJobTelemetryFromActiveContext();
      const job = await queue.add(
        RECONCILE_JOB_NAMES.MANUAL,
        { triggeredBy: 'manual', requestedAt: now() },
        { jobId: RECONCILE_MANUAL_JOB_ID, ...(telemetry ? { telemetry } : {}) }
      );
      return { jobId: job.id ?? RECONCILE_MANUAL_JOB_ID, alreadyQueued: false };
    },
  };
}

/**
 * Registers (or replaces) the repeatable run. The template's `requestedAt` is the registration
 * time; scheduled runs are told apart by their timestamps in the run record.
 */
export async function registerReconcileSchedule(
  queue: ReconcileQueue,
  schedule: Readonly<{ cron: string; timezone: string }>,
  logger: Logger,
  now: () => number = Date.now
): Promise<void> {
  await queue.upsertJobScheduler(
    RECONCILE_SCHEDULER_ID,
    { pattern: schedule.cron, tz: schedule.timezone },
    {
      name: RECONCILE_JOB_NAMES.SCHEDULED,
      data: { triggeredBy: 'scheduler', requestedAt: now() },
    }
  );
  logger.info({ cron: schedule.cron, timezone: schedule.timezone }, 'Reconcile schedule registered');
}

// ============================================
// Worker
// ============================================

export type StartReconcileWorkerOptions = Readonly<{
  config: QueueManagerConfig;
  deps: ReconcileJobDeps;
  shutdownSignal: AbortSignal;
}>;

/** Concurrency 1: runs never overlap within a process. */
export function startReconcileWorker(options: StartReconcileWorkerOptions): Worker<unknown> {
  const { logger } = options.deps;

  const { worker } = createWorker<unknown>(
    { config: options.config, logger },
    {
      name: RECONCILE_QUEUE_NAME,
      processor: (job, signal) => processReconcileJob(job, signal, options.deps),
      workerOptions: { concurrency: 1 },
      shutdownSignal: options.shutdownSignal,
      enableDlq: true,
    }
  );

  worker.on('failed', (job, error) => {
    logger.error(
      { jobId: job?.id ?? null, attemptsMade: job?.attemptsMade ?? 0, error },
      'Reconcile job failed'
    );
  });
  worker.on('error', (error) => {
    logger.error({ error }, 'Reconcile worker error');
  });

  return worker;
}
