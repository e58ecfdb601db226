import { withSpan, type Logger } from '@app/logger';
import type { MissingProductStatus, ReconcileSettings } from '@app/types';

import { errorMessage } from './errors.js';
import type { FeedIndex, FeedRecord } from './feed-ingestor.js';
import type { InventoryStore, MissingProductStore } from './ports.js';

const MISSING_PRODUCT_TRANSITIONS: Readonly<
  Record<MissingProductStatus, ReadonlySet<MissingProductStatus>>
> = {
  missing: new Set(['missing', 'created', 'ignored']),
  created: new Set(),
  ignored: new Set(),
};

export function isValidMissingTransition(
  from: MissingProductStatus,
  to: MissingProductStatus
): boolean {
  return MISSING_PRODUCT_TRANSITIONS[from].has(to);
}

export type MissingResolution = Readonly<{
  created: number;
  ignored: number;
  refreshed: number;
  /** SKUs left alone because an `ignored` record already covers them. */
  alreadyIgnored: number;
  skippedByFilter: number;
  /** Feed SKUs no inventory item accounted for, before the prefix filter. */
  unmatched: number;
  errors: number;
}>;

export function passesPrefixFilter(
  sku: string,
  settings: Pick<ReconcileSettings, 'prefixFilterEnabled' | 'allowedPrefixes'>
): boolean {
  if (!settings.prefixFilterEnabled || settings.allowedPrefixes.length === 0) return true;
  return settings.allowedPrefixes.some((prefix) => sku.startsWith(prefix));
}

export function missingNote(quantity: number): string {
  return `Product found in feed but missing from inventory. Feed quantity: ${quantity}`;
}

export function stillMissingNote(quantity: number): string {
  return `Product still missing from inventory. Latest feed quantity: ${quantity}`;
}

export function relaxedMatchNote(itemId: string): string {
  return `Ignored: SKU matches existing inventory item (normalized). Item ID ${itemId}.`;
}

async function resolveRecord(params: {
  record: FeedRecord;
  missingStore: MissingProductStore;
  inventory: Pick<InventoryStore, 'findBySkuRelaxed'>;
  now: Date;
}): Promise<'created' | 'ignored' | 'refreshed' | 'alreadyIgnored'> {
  const { record, missingStore, inventory, now } = params;

  const open = await missingStore.findOpenBySku(record.sku);
  if (open) {
    await missingStore.refresh(open.id, {
      lastSyncAt: now,
      quantity: record.rawQuantity,
      note: stillMissingNote(record.rawQuantity),
    });
    return 'refreshed';
  }

  // ignored is terminal: the SKU is never filed again
  const ignored = await missingStore.findBySku(record.sku, 'ignored');
  if (ignored) return 'alreadyIgnored';

  const existing = await inventory.findBySkuRelaxed(record.sku);
  const base = {
    sku: record.sku,
    externalId: record.externalId,
    barcode: record.barcode,
    brand: record.brand,
    quantity: record.rawQuantity,
    firstSeenAt: now,
    lastSyncAt: now,
  };

  if (existing) {
    await missingStore.create({
      ...base,
      status: 'ignored',
      note: `${missingNote(record.rawQuantity)}\n${relaxedMatchNote(existing.itemId)}`,
    });
    return 'ignored';
  }

  await missingStore.create({ ...base, status: 'missing', note: missingNote(record.rawQuantity) });
  return 'created';
}

/**
 * Records feed SKUs that no inventory item consumed. Open records are refreshed in place, SKUs
 * with an `ignored` record are skipped, and SKUs that match an inventory item once punctuation
 * is ignored are filed as `ignored`.
 */
export async function resolveMissingProducts(params: {
  index: FeedIndex;
  matchedSkus: ReadonlySet<string>;
  settings: Pick<ReconcileSettings, 'prefixFilterEnabled' | 'allowedPrefixes'>;
  missingStore: MissingProductStore;
  inventory: Pick<InventoryStore, 'findBySkuRelaxed'>;
  logger: Logger;
  now?: () => Date;
}): Promise<MissingResolution> {
  const { index, matchedSkus, settings, missingStore, inventory, logger } = params;
  const now = params.now ?? (() => new Date());

  return withSpan('reconcile.missing.resolve', {}, async () => {
    const counts = {
      created: 0,
      ignored: 0,
      refreshed: 0,
      alreadyIgnored: 0,
      skippedByFilter: 0,
      unmatched: 0,
    };
    let errors = 0;

    for (const [normalizedSku, record] of index.bySku) {
      if (matchedSkus.has(normalizedSku)) continue;
      counts.unmatched += 1;

      if (!passesPrefixFilter(record.sku, settings)) {
        counts.skippedByFilter += 1;
        continue;
      }

      try {
        const outcome = await resolveRecord({ record, missingStore, inventory, now: now() });
        counts[outcome] += 1;
      } catch (error) {
        errors += 1;
        logger.warn(
          { sku: record.sku, error: errorMessage(error) },
          'Failed to record missing product'
        );
      }
    }

    const result: MissingResolution = { ...counts, errors };
    logger.info({ ...result }, 'Missing products resolved');
    return result;
  });
}
