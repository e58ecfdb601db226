import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createNoopLogger } from '@app/logger';
import { emptyRunCounters, type RunParams } from '@app/reconciler';
import type { ReconcileJobPayload, ReconcileRunSummary, ReconcileSettings } from '@app/types';

import {
  createQueueRunTrigger,
  processReconcileJob,
  registerReconcileSchedule,
  type ReconcileJob,
  type ReconcileQueue,
} from '../worker.js';

const RUN_ID = '00000000-0000-4000-8000-00000000000a';

const settings: ReconcileSettings = {
  prefixFilterEnabled: false,
  allowedPrefixes: [],
  notificationsEnabled: false,
  recipientEmail: null,
  batchSize: 50,
  isolation: 'batch',
  missingRetentionHours: 72,
};

function summary(): ReconcileRunSummary {
  return {
    runId: RUN_ID,
    status: 'success',
    message: 'done',
    triggeredBy: 'manual',
    startedAt: new Date('2026-01-05T10:00:00.000Z'),
    finishedAt: new Date('2026-01-05T10:01:00.000Z'),
    counters: emptyRunCounters(),
  };
}

function fakeJob(data: unknown): ReconcileJob & {
  updates: ReconcileJobPayload[];
  progress: object[];
} {
  const updates: ReconcileJobPayload[] = [];
  const progress: object[] = [];
  return {
    id: 'job-1',
    name: 'reconcile.manual',
    data,
    attemptsMade: 0,
    updates,
    progress,
    updateData(next) {
      updates.push(next);
      return Promise.resolve();
    },
    updateProgress(next) {
      progress.push(next);
      return Promise.resolve();
    },
  };
}

void describe('processReconcileJob', () => {
  void it('returns null for an invalid payload without running', async () => {
    let runs = 0;
    const result = await processReconcileJob(fakeJob({ triggeredBy: 'nobody' }), new AbortController().signal, {
      orchestrator: {
        run: () => {
          runs += 1;
          return Promise.resolve(summary());
        },
      },
      settings: { load: () => Promise.resolve(settings) },
      logger: createNoopLogger(),
    });
    assert.equal(result, null);
    assert.equal(runs, 0);
  });

  void it('stores the run id on the job and forwards progress', async () => {
    const job = fakeJob({ triggeredBy: 'manual', requestedAt: 1 });
    const signal = new AbortController().signal;
    let seen: RunParams | undefined;

    const result = await processReconcileJob(job, signal, {
      orchestrator: {
        async run(params) {
          seen = params;
          await params.onRunStarted?.(RUN_ID);
          await params.onProgress?.({ batchIndex: 0, totalItems: 4, processed: 2, failed: 0 });
          return summary();
        },
      },
      settings: { load: () => Promise.resolve(settings) },
      logger: createNoopLogger(),
    });

    assert.equal(result?.runId, RUN_ID);
    assert.equal(seen?.triggeredBy, 'manual');
    assert.equal(seen?.signal, signal);
    assert.equal(seen?.resumeRunId, undefined);
    assert.deepEqual(seen?.settings, settings);
    assert.deepEqual(job.updates, [{ triggeredBy: 'manual', requestedAt: 1, runId: RUN_ID }]);
    assert.deepEqual(job.progress, [{ batchIndex: 0, totalItems: 4, processed: 2, failed: 0 }]);
  });

  void it('resumes the run recorded on a retried job', async () => {
    const job = fakeJob({ triggeredBy: 'scheduler', requestedAt: 1, runId: RUN_ID });
    let resumeRunId: string | undefined;

    await processReconcileJob(job, new AbortController().signal, {
      orchestrator: {
        async run(params) {
          resumeRunId = params.resumeRunId;
          await params.onRunStarted?.(RUN_ID);
          return summary();
        },
      },
      settings: { load: () => Promise.resolve(settings) },
      logger: createNoopLogger(),
    });

    assert.equal(resumeRunId, RUN_ID);
    assert.deepEqual(job.updates, []);
  });
});

type Added = { name: string; data: ReconcileJobPayload; jobId: string | undefined };

function fakeQueue(state: string | null): ReconcileQueue & {
  added: Added[];
  removed: { count: number };
  schedulers: unknown[][];
} {
  const added: Added[] = [];
  const removed = { count: 0 };
  const schedulers: unknown[][] = [];
  return {
    added,
    removed,
    schedulers,
    getJob() {
      if (state === null) return Promise.resolve(undefined);
      return Promise.resolve({
        getState: () => Promise.resolve(state),
        remove: () => {
          removed.count += 1;
          return Promise.resolve();
        },
      });
    },
    add(name, data, opts) {
      added.push({ name, data, jobId: opts?.jobId });
      return Promise.resolve({ id: opts?.jobId });
    },
    upsertJobScheduler(id, repeat, template) {
      schedulers.push([id, repeat, template]);
      return Promise.resolve(null);
    },
  };
}

void describe('createQueueRunTrigger', () => {
  void it('adds a manual job when none exists', async () => {
    const queue = fakeQueue(null);
    const result = await createQueueRunTrigger(queue, () => 42).enqueueManualRun();

    assert.deepEqual(result, { jobId: 'reconcile-manual', alreadyQueued: false });
    assert.deepEqual(queue.added, [
      {
        name: 'reconcile.manual',
        data: { triggeredBy: 'manual', requestedAt: 42 },
        jobId: 'reconcile-manual',
      },
    ]);
  });

  void it('reports a pending manual job instead of adding another', async () => {
    const queue = fakeQueue('active');
    const result = await createQueueRunTrigger(queue).enqueueManualRun();

    assert.deepEqual(result, { jobId: 'reconcile-manual', alreadyQueued: true });
    assert.equal(queue.added.length, 0);
    assert.equal(queue.removed.count, 0);
  });

  void it('replaces a finished manual job', async () => {
    const queue = fakeQueue('completed');
    const result = await createQueueRunTrigger(queue, () => 7).enqueueManualRun();

    assert.equal(result.alreadyQueued, false);
    assert.equal(queue.removed.count, 1);
    assert.equal(queue.added.length, 1);
  });
});

void describe('registerReconcileSchedule', () => {
  void it('upserts the cron scheduler with a scheduled job template', async () => {
    const queue = fakeQueue(null);
    await registerReconcileSchedule(
      queue,
      { cron: '0 */6 * * *', timezone: 'UTC' },
      createNoopLogger(),
      () => 100
    );

    assert.deepEqual(queue.schedulers, [
      [
        'reconcile-cron',
        { pattern: '0 */6 * * *', tz: 'UTC' },
        { name: 'reconcile.scheduled', data: { triggeredBy: 'scheduler', requestedAt: 100 } },
      ],
    ]);
  });
});
