import type { AppEnv } from '@app/config';
import { createNoopLogger, type Logger } from '@app/logger';

import {
  Queue,
  Worker,
  type ConnectionOptions,
  type Job,
  type JobsOptions,
  type QueueOptions,
  type WorkerOptions,
} from 'bullmq';

import { context as otelContext, metrics, propagation, type Context } from '@opentelemetry/api';

import { defaultJobTimeoutMs, defaultQueuePolicy, resolveBackoffMs } from './policy.js';
import { isKnownQueueName, toDlqQueueName } from './names.js';
import { redisOptionsFromUrl } from './redis.js';

export type QueueManagerConfig = Readonly<{
  redisUrl: string;
}>;

type TelemetryCarrier = Record<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function carrierFromObject(obj: Record<string, unknown>): TelemetryCarrier | null {
  const traceparent = typeof obj['traceparent'] === 'string' ? obj['traceparent'] : undefined;
  const tracestate = typeof obj['tracestate'] === 'string' ? obj['tracestate'] : undefined;
  if (!traceparent) return null;
  return {
    traceparent,
    ...(tracestate ? { tracestate } : {}),
  };
}

function carrierFromTelemetry(raw: unknown): TelemetryCarrier | null {
  if (raw == null) return null;

  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!trimmed) return null;

    // Accept either raw traceparent or a JSON string {traceparent,tracestate}.
    if (trimmed.startsWith('{')) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        return null;
      }
      return isRecord(parsed) ? carrierFromObject(parsed) : null;
    }

    return { traceparent: trimmed };
  }

  return isRecord(raw) ? carrierFromObject(raw) : null;
}

export function extractOtelContextFromTelemetryMetadata(metadata: unknown): Context {
  const carrier = carrierFromTelemetry(metadata);
  if (!carrier?.['traceparent']) return otelContext.active();

  return propagation.extract(otelContext.active(), carrier, {
    get: (c, key) => c[key],
    keys: (c) => Object.keys(c),
  });
}

/** Runs `fn` in the trace context carried by the job's telemetry metadata. */
export async function withJobTelemetryContext<T>(
  job: Pick<Job, 'opts'>,
  fn: () => T | Promise<T>
): Promise<T> {
  const extracted = extractOtelContextFromTelemetryMetadata(job.opts.telemetry?.metadata);
  return await otelContext.with(extracted, fn);
}

export function buildJobTelemetryFromActiveContext(): { metadata: string } | undefined {
  const carrier: TelemetryCarrier = {};

  propagation.inject(otelContext.active(), carrier, {
    set: (c, key, value) => {
      c[key] = String(value);
    },
  });

  const traceparent = carrier['traceparent'];
  if (!traceparent) return undefined;

  const tracestate = carrier['tracestate'];
  return {
    metadata: JSON.stringify({
      traceparent,
      ...(tracestate ? { tracestate } : {}),
    }),
  };
}

const meter = metrics.getMeter('stock-reconciler.queue-manager');
const dlqEntriesTotal = meter.createCounter('queue_dlq_entries_total', {
  description: 'Total jobs moved to DLQ',
});

export function configFromEnv(env: Pick<AppEnv, 'redisUrl'>): QueueManagerConfig {
  return { redisUrl: env.redisUrl };
}

export type CreateQueueManagerOptions = Readonly<{
  config: QueueManagerConfig;
  logger?: Logger;
}>;

const DLQ_RETENTION_SECONDS = 30 * 86400;

export function buildConnection(config: QueueManagerConfig): ConnectionOptions {
  return {
    ...redisOptionsFromUrl(config.redisUrl),
    enableReadyCheck: true,
    connectTimeout: 10_000,
    retryStrategy: (times: number) => Math.min(times * 50, 2_000),
    // BullMQ workers require blocking commands without a retry cap.
    maxRetriesPerRequest: null,
  };
}

export type DlqEntry = Readonly<{
  originalQueue: string;
  originalJobId: string | null;
  originalJobName: string;
  attemptsMade: number;
  failedReason: string | null;
  stacktrace: readonly string[];
  data: unknown;
  occurredAt: string;
}>;

export type CreateQueueOptions = Readonly<{
  name: string;
  queueOptions?: Omit<QueueOptions, 'connection' | 'defaultJobOptions'>;
  defaultJobOptions?: Partial<JobsOptions>;
}>;

/** Queue with the default retry policy applied; per-queue overrides win. */
export function buildDefaultJobOptions(overrides: Partial<JobsOptions> = {}): JobsOptions {
  const policy = defaultQueuePolicy();
  return {
    ...overrides,
    attempts: overrides.attempts ?? policy.attempts,
    removeOnComplete: overrides.removeOnComplete ?? policy.removeOnComplete,
    removeOnFail: overrides.removeOnFail ?? policy.removeOnFail,
    backoff: overrides.backoff ?? policy.backoff,
  };
}

export function createQueue(options: CreateQueueManagerOptions, queue: CreateQueueOptions): Queue {
  return new Queue(queue.name, {
    connection: buildConnection(options.config),
    defaultJobOptions: buildDefaultJobOptions(queue.defaultJobOptions),
    ...(queue.queueOptions ?? {}),
  });
}

export type JobProcessor<TData> = (job: Job<TData>, signal: AbortSignal) => Promise<unknown>;

export type CreateWorkerOptions<TData = unknown> = Readonly<{
  name: string;
  processor: JobProcessor<TData>;
  workerOptions?: Omit<WorkerOptions, 'connection' | 'settings'>;
  /** Aborts the job's signal after this long. Defaults to the queue's timeout; null disables. */
  jobTimeoutMs?: number | null;
  /** Aborts every active job, e.g. on shutdown. */
  shutdownSignal?: AbortSignal;
  /** If true, jobs that exhausted their retries are copied into `${name}-dlq`. */
  enableDlq?: boolean;
  onDlqEntry?: (entry: DlqEntry) => void;
}>;

function resolveTimeoutMs(name: string, configured: number | null | undefined): number | null {
  if (configured !== undefined) return configured;
  return isKnownQueueName(name) ? defaultJobTimeoutMs(name) : null;
}

/**
 * Wraps `processor` with trace propagation and a per-job abort signal. The signal fires on
 * timeout or shutdown; the processor decides where it is safe to stop.
 */
export function wrapProcessor<TJob extends Pick<Job, 'opts'>>(
  processor: (job: TJob, signal: AbortSignal) => Promise<unknown>,
  options: Readonly<{ timeoutMs: number | null; shutdownSignal?: AbortSignal }>
): (job: TJob) => Promise<unknown> {
  return (job) =>
    withJobTelemetryContext(job, async () => {
      const controller = new AbortController();
      const signal = options.shutdownSignal
        ? AbortSignal.any([options.shutdownSignal, controller.signal])
        : controller.signal;

      const timer =
        options.timeoutMs && options.timeoutMs > 0
          ? setTimeout(() => {
              controller.abort(new Error(`Job exceeded timeout of ${options.timeoutMs}ms`));
            }, options.timeoutMs)
          : null;

      try {
        return await processor(job, signal);
      } finally {
        if (timer) clearTimeout(timer);
      }
    });
}

export function createWorker<TData = unknown>(
  options: CreateQueueManagerOptions,
  worker: CreateWorkerOptions<TData>
): { worker: Worker<TData>; dlqQueue?: Queue } {
  const policy = defaultQueuePolicy();
  const logger = (options.logger ?? createNoopLogger()).child({ queueName: worker.name });

  const processor = wrapProcessor<Job<TData>>(worker.processor, {
    timeoutMs: resolveTimeoutMs(worker.name, worker.jobTimeoutMs),
    ...(worker.shutdownSignal ? { shutdownSignal: worker.shutdownSignal } : {}),
  });

  const dlqQueue = worker.enableDlq
    ? createQueue(options, { name: toDlqQueueName(worker.name) })
    : undefined;

  const w = new Worker<TData>(worker.name, processor, {
    connection: buildConnection(options.config),
    settings: {
      backoffStrategy: (attemptsMade, type, _err, job) =>
        resolveBackoffMs(attemptsMade, type, job?.opts.backoff),
    },
    ...(worker.workerOptions ?? {}),
  });

  if (dlqQueue) {
    const handleFailed = async (job: Job<TData>, err: Error): Promise<void> => {
      const maxAttempts = job.opts.attempts ?? policy.attempts;
      // attemptsMade is the 1-based attempt count; only the terminal failure goes to the DLQ.
      if (job.attemptsMade < maxAttempts) return;

      const entry: DlqEntry = {
        originalQueue: worker.name,
        originalJobId: job.id != null ? String(job.id) : null,
        originalJobName: job.name,
        attemptsMade: job.attemptsMade,
        failedReason: err.message,
        stacktrace: job.stacktrace,
        data: job.data,
        occurredAt: new Date().toISOString(),
      };

      // BullMQ rejects custom job ids containing ':'
      const derivedJobId = entry.originalJobId ? `${worker.name}__${entry.originalJobId}` : null;
      await dlqQueue.add(job.name, entry, {
        ...(derivedJobId ? { jobId: derivedJobId } : {}),
        removeOnComplete: { age: DLQ_RETENTION_SECONDS },
        removeOnFail: { age: DLQ_RETENTION_SECONDS },
      });

      dlqEntriesTotal.add(1, { queue_name: worker.name });
      logger.error(
        {
          dlqQueueName: dlqQueue.name,
          jobName: entry.originalJobName,
          originalJobId: entry.originalJobId,
          attemptsMade: entry.attemptsMade,
          failedReason: entry.failedReason,
        },
        'Job moved to DLQ'
      );
      worker.onDlqEntry?.(entry);
    };

    w.on('failed', (job, err) => {
      if (!job) return;
      handleFailed(job, err).catch((dlqError: unknown) => {
        // the original failed job stays in place for investigation
        logger.error(
          { jobId: job.id ?? null, jobName: job.name, error: dlqError },
          'Failed to write DLQ entry'
        );
      });
    });

    return { worker: w, dlqQueue };
  }

  return { worker: w };
}
