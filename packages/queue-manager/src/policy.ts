import type { JobsOptions } from 'bullmq';

import type { KnownQueueName } from './names.js';

export const EXP4_BACKOFF_STRATEGY = 'exp4' as const;

/**
 * Backoff schedule: 1s → 4s → 16s (factor 4).
 *
 * NOTE: BullMQ calls the strategy for retries only.
 */
export function exp4BackoffMs(attemptsMade: number): number {
  // attemptsMade is 1 for the first retry.
  const retryIndex = Math.max(0, attemptsMade - 1);
  return 1000 * 4 ** retryIndex;
}

export type QueuePolicy = Readonly<{
  attempts: number;
  removeOnComplete: NonNullable<JobsOptions['removeOnComplete']>;
  removeOnFail: NonNullable<JobsOptions['removeOnFail']>;
  backoff: NonNullable<JobsOptions['backoff']>;
}>;

export type QueueTimeoutsMs = Readonly<Record<KnownQueueName, number>>;

/**
 * When a job runs past its timeout its abort signal fires; the reconcile run stops at the next
 * batch boundary.
 */
export const DEFAULT_QUEUE_TIMEOUTS_MS: QueueTimeoutsMs = {
  'reconcile-queue': 2 * 60 * 60_000,
} as const;

export function defaultJobTimeoutMs(queueName: KnownQueueName): number {
  return DEFAULT_QUEUE_TIMEOUTS_MS[queueName];
}

export function defaultQueuePolicy(): QueuePolicy {
  return {
    attempts: 3,
    // Keep completed jobs for 24h (age in seconds).
    removeOnComplete: { age: 86400 },
    // Keep failed jobs for 7 days.
    removeOnFail: { age: 604800 },
    backoff: {
      type: EXP4_BACKOFF_STRATEGY,
      delay: 1000,
    },
  };
}

/** Resolves the retry delay for the built-in and custom backoff types. */
export function resolveBackoffMs(
  attemptsMade: number,
  type: string | undefined,
  configured: JobsOptions['backoff']
): number {
  if (type === EXP4_BACKOFF_STRATEGY) return exp4BackoffMs(attemptsMade);

  const baseDelay =
    typeof configured === 'number'
      ? configured
      : typeof configured === 'object'
        ? (configured.delay ?? 0)
        : 0;

  if (type === 'exponential') return baseDelay * 2 ** Math.max(0, attemptsMade - 1);
  return baseDelay;
}
