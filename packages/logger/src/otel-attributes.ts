export const OTEL_ATTR = {
  REQUEST_ID: 'http.request_id',

  QUEUE_NAME: 'queue.name',
  QUEUE_JOB_ID: 'queue.job.id',
  QUEUE_JOB_NAME: 'queue.job.name',
  QUEUE_ATTEMPTS_MADE: 'queue.attempts_made',

  RUN_ID: 'reconcile.run.id',
  RUN_TRIGGERED_BY: 'reconcile.run.triggered_by',
  RUN_TOTAL_ITEMS: 'reconcile.run.total_items',
  BATCH_INDEX: 'reconcile.batch.index',
  BATCH_SIZE: 'reconcile.batch.size',
  FEED_RECORDS: 'reconcile.feed.records',
} as const;

export type OtelAttrKey = (typeof OTEL_ATTR)[keyof typeof OTEL_ATTR];
