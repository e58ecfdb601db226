import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createNoopLogger } from '@app/logger';
import { emptyRunCounters, type RunReport } from '@app/reconciler';

import { computeSignature, createWebhookReportDispatcher } from '../report-dispatcher.js';

const report: RunReport = {
  runId: '00000000-0000-4000-8000-000000000001',
  status: 'success',
  message: 'Processed 10 of 10 items, 0 failed in 0 batches',
  triggeredBy: 'scheduler',
  startedAt: '2026-01-05T10:00:00.000Z',
  finishedAt: '2026-01-05T10:05:00.000Z',
  counters: emptyRunCounters(),
  totals: { logEntries: 10, alerts: 2, highStock: 8, missing: 3, unpublished: 1 },
  entries: [],
};

type Captured = { body: string; headers: Headers };

function recordingFetch(statuses: number[], captured: Captured[]): typeof fetch {
  return (_input, init) => {
    captured.push({
      body: typeof init?.body === 'string' ? init.body : '',
      headers: new Headers(init?.headers),
    });
    const status = statuses.shift() ?? 200;
    return Promise.resolve(new Response(null, { status }));
  };
}

void describe('createWebhookReportDispatcher', () => {
  void it('posts a signed report with its subject', async () => {
    const captured: Captured[] = [];
    const dispatcher = createWebhookReportDispatcher({
      url: new URL('https://hooks.example.test/report'),
      secret: 'test-secret',
      logger: createNoopLogger(),
      fetchImpl: recordingFetch([200], captured),
      now: () => 1_767_607_200_000,
    });

    await dispatcher.dispatch({ recipient: 'ops@example.test', report });

    const [call] = captured;
    assert.ok(call);
    const payload: unknown = JSON.parse(call.body);
    assert.deepEqual(payload, {
      recipient: 'ops@example.test',
      subject: 'Stock reconciliation completed 2026-01-05: 2 alerts, 3 missing',
      report,
    });
    assert.equal(call.headers.get('x-reconciler-event'), 'reconcile_report');
    assert.equal(call.headers.get('x-reconciler-timestamp'), '1767607200000');
    assert.equal(
      call.headers.get('x-reconciler-signature'),
      computeSignature('test-secret', '1767607200000', call.body)
    );
  });

  void it('omits the signature without a secret', async () => {
    const captured: Captured[] = [];
    const dispatcher = createWebhookReportDispatcher({
      url: new URL('https://hooks.example.test/report'),
      secret: null,
      logger: createNoopLogger(),
      fetchImpl: recordingFetch([204], captured),
    });

    await dispatcher.dispatch({ recipient: 'ops@example.test', report });

    assert.equal(captured[0]?.headers.get('x-reconciler-signature'), null);
  });

  void it('retries with exponential backoff before succeeding', async () => {
    const captured: Captured[] = [];
    const sleeps: number[] = [];
    const dispatcher = createWebhookReportDispatcher({
      url: new URL('https://hooks.example.test/report'),
      secret: null,
      logger: createNoopLogger(),
      fetchImpl: recordingFetch([500, 502, 200], captured),
      sleep: (ms) => {
        sleeps.push(ms);
        return Promise.resolve();
      },
    });

    await dispatcher.dispatch({ recipient: 'ops@example.test', report });

    assert.equal(captured.length, 3);
    assert.deepEqual(sleeps, [1000, 2000]);
  });

  void it('throws the last error once attempts run out', async () => {
    const captured: Captured[] = [];
    const dispatcher = createWebhookReportDispatcher({
      url: new URL('https://hooks.example.test/report'),
      secret: null,
      logger: createNoopLogger(),
      fetchImpl: recordingFetch([500, 500, 503], captured),
      sleep: () => Promise.resolve(),
    });

    await assert.rejects(
      dispatcher.dispatch({ recipient: 'ops@example.test', report }),
      /Report webhook failed with status 503/
    );
    assert.equal(captured.length, 3);
  });
});
