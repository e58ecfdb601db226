import { createHmac } from 'node:crypto';

import type { Logger } from '@app/logger';
import { reportSubject, type ReportDispatcher, type RunReport } from '@app/reconciler';

export const REPORT_EVENT = 'reconcile_report';

export function computeSignature(secret: string, timestamp: string, body: string): string {
  return createHmac('sha256', secret).update(`${timestamp}.${body}`).digest('hex');
}

export type ReportWebhookPayload = Readonly<{
  recipient: string;
  subject: string;
  report: RunReport;
}>;

export type WebhookReportDispatcherOptions = Readonly<{
  url: URL;
  secret: string | null;
  logger: Logger;
  maxAttempts?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}>;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Posts the run report to a webhook that relays it to the recipient. Retries with exponential
 * backoff (1s, 2s, ...) and throws the last error once attempts run out.
 */
export function createWebhookReportDispatcher(
  options: WebhookReportDispatcherOptions
): ReportDispatcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const maxAttempts = options.maxAttempts ?? 3;
  const timeoutMs = options.timeoutMs ?? 10_000;

  return {
    async dispatch({ recipient, report }) {
      const payload: ReportWebhookPayload = { recipient, subject: reportSubject(report), report };
      const body = JSON.stringify(payload);

      let lastError: unknown;
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
          const timestamp = String(now());
          const signature = options.secret
            ? computeSignature(options.secret, timestamp, body)
            : undefined;
          const response = await fetchImpl(options.url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              'X-Reconciler-Event': REPORT_EVENT,
              'X-Reconciler-Timestamp': timestamp,
              ...(signature ? { 'X-Reconciler-Signature': signature } : {}),
            },
            body,
            signal: AbortSignal.timeout(timeoutMs),
          });
          if (!response.ok) {
            throw new Error(`Report webhook failed with status ${response.status}`);
          }
          return;
        } catch (error) {
          lastError = error;
          options.logger.warn(
            { attempt, maxAttempts, error: error instanceof Error ? error.message : String(error) },
            'Report webhook attempt failed'
          );
          if (attempt >= maxAttempts) break;
          await sleep(1000 * 2 ** (attempt - 1));
        }
      }
      throw lastError instanceof Error ? lastError : new Error('Report webhook dispatch failed');
    },
  };
}
