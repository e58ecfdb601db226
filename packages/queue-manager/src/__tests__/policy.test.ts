import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  defaultJobTimeoutMs,
  defaultQueuePolicy,
  exp4BackoffMs,
  EXP4_BACKOFF_STRATEGY,
  resolveBackoffMs,
} from '../policy.js';
import { buildDefaultJobOptions } from '../queue-manager.js';

void describe('exp4BackoffMs', () => {
  void it('uses a factor-4 schedule (1s, 4s, 16s...)', () => {
    assert.equal(exp4BackoffMs(1), 1000);
    assert.equal(exp4BackoffMs(2), 4000);
    assert.equal(exp4BackoffMs(3), 16000);
  });
});

void describe('defaultQueuePolicy', () => {
  void it('sets attempts=3 and the exp4 backoff strategy', () => {
    const policy = defaultQueuePolicy();
    assert.equal(policy.attempts, 3);
    assert.deepEqual(policy.backoff, { type: EXP4_BACKOFF_STRATEGY, delay: 1000 });
  });
});

void describe('resolveBackoffMs', () => {
  void it('doubles a configured exponential delay per retry', () => {
    assert.equal(resolveBackoffMs(1, 'exponential', { type: 'exponential', delay: 500 }), 500);
    assert.equal(resolveBackoffMs(3, 'exponential', { type: 'exponential', delay: 500 }), 2000);
  });

  void it('uses the fixed delay otherwise', () => {
    assert.equal(resolveBackoffMs(4, 'fixed', 750), 750);
    assert.equal(resolveBackoffMs(2, EXP4_BACKOFF_STRATEGY, undefined), 4000);
  });
});

void describe('buildDefaultJobOptions', () => {
  void it('lets per-queue overrides win over the policy', () => {
    const options = buildDefaultJobOptions({ attempts: 1, priority: 2 });
    assert.equal(options.attempts, 1);
    assert.equal(options.priority, 2);
    assert.deepEqual(options.removeOnComplete, { age: 86400 });
  });
});

void describe('defaultJobTimeoutMs', () => {
  void it('bounds a reconcile job at two hours', () => {
    assert.equal(defaultJobTimeoutMs('reconcile-queue'), 7_200_000);
  });
});
