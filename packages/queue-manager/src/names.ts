export const RECONCILE_QUEUE_NAME = 'reconcile-queue' as const;

export const QUEUE_NAMES = [RECONCILE_QUEUE_NAME] as const;

export type KnownQueueName = (typeof QUEUE_NAMES)[number];

export function isKnownQueueName(name: string): name is KnownQueueName {
  return QUEUE_NAMES.some((known) => known === name);
}

/** Job names on the reconcile queue. */
export const RECONCILE_JOB_NAMES = {
  MANUAL: 'reconcile.manual',
  SCHEDULED: 'reconcile.scheduled',
} as const;

/** Fixed scheduler id so a restart replaces the repeatable job instead of adding another. */
export const RECONCILE_SCHEDULER_ID = 'reconcile-cron';

/** Job id of the pending manual run; BullMQ ignores an add while it is still queued. */
export const RECONCILE_MANUAL_JOB_ID = 'reconcile-manual';

export function toDlqQueueName(queueName: string): string {
  const normalized = queueName.trim();
  if (!normalized) {
    throw new Error('queue_name_empty');
  }

  if (normalized.endsWith('-dlq')) return normalized;
  return `${normalized}-dlq`;
}
