import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { validateReconcileJobPayload } from '../jobs.js';

void describe('validateReconcileJobPayload', () => {
  void it('accepts manual and scheduled payloads', () => {
    assert.equal(validateReconcileJobPayload({ triggeredBy: 'manual', requestedAt: 1 }), true);
    assert.equal(
      validateReconcileJobPayload({
        triggeredBy: 'scheduler',
        requestedAt: 1_700_000_000_000,
        runId: '0b9e5a4c-1f6d-4c55-9a52-3d1e0f7b8c21',
      }),
      true
    );
  });

  void it('rejects unknown triggers and bad timestamps', () => {
    assert.equal(validateReconcileJobPayload({ triggeredBy: 'cron', requestedAt: 1 }), false);
    assert.equal(validateReconcileJobPayload({ triggeredBy: 'manual', requestedAt: 'now' }), false);
    assert.equal(
      validateReconcileJobPayload({ triggeredBy: 'manual', requestedAt: Number.NaN }),
      false
    );
  });

  void it('rejects malformed run ids', () => {
    assert.equal(
      validateReconcileJobPayload({ triggeredBy: 'manual', requestedAt: 1, runId: 'run-1' }),
      false
    );
  });

  void it('rejects non-objects', () => {
    assert.equal(validateReconcileJobPayload(null), false);
    assert.equal(validateReconcileJobPayload('manual'), false);
  });
});
