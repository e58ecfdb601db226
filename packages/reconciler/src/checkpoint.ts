import type { DriverCheckpoint } from '@app/types';

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object';
}

function readCount(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  return Math.max(0, Math.trunc(value));
}

/**
 * Validates a checkpoint read back from the run record. Anything unrecognised yields null and
 * the run starts from the beginning.
 */
export function readDriverCheckpoint(raw: unknown): DriverCheckpoint | null {
  if (!isObject(raw)) return null;
  if (raw['version'] !== 1) return null;

  const lastItemId = raw['lastItemId'];
  if (lastItemId !== null && typeof lastItemId !== 'string') return null;

  const processed = readCount(raw['processed']);
  const failed = readCount(raw['failed']);
  const batches = readCount(raw['batches']);
  const failedBatches = readCount(raw['failedBatches']);
  if (processed === null || failed === null || batches === null || failedBatches === null) {
    return null;
  }

  const matchedSkus = raw['matchedSkus'];
  if (!Array.isArray(matchedSkus)) return null;
  const skus: string[] = [];
  for (const sku of matchedSkus) {
    if (typeof sku !== 'string') return null;
    skus.push(sku);
  }

  const updatedAtIso = raw['updatedAtIso'];
  if (typeof updatedAtIso !== 'string' || !updatedAtIso) return null;

  return {
    version: 1,
    lastItemId,
    processed,
    failed,
    batches,
    failedBatches,
    matchedSkus: skus,
    updatedAtIso,
  };
}
