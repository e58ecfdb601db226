import type { InventoryItem, ReconciliationLogEntry, UnpublishedProductEntry } from '@app/types';

import type { FeedIndex, FeedRecord } from './feed-ingestor.js';
import { isValidIdentifier, normalize, sanitize } from './normalizer.js';
import { computePublishDecision, isAlert, quantityTier, shouldMutateStock } from './rules.js';

export type MatchedVia = 'SKU' | 'BARCODE' | 'NONE';

export type MatchResult = Readonly<{
  feedRecord: FeedRecord | null;
  matchedVia: MatchedVia;
  /** Normalized feed SKU this item accounts for; excluded from the missing-product pass. */
  consumedSku: string | null;
}>;

export type StockMutation = Readonly<{
  previousQuantity: number;
  newQuantity: number;
}>;

export type ItemOutcome = Readonly<{
  itemId: string;
  match: MatchResult;
  tier: number;
  alert: boolean;
  publish: boolean;
  logEntry: ReconciliationLogEntry;
  unpublishedEntry: UnpublishedProductEntry | null;
  stockMutation: StockMutation | null;
}>;

export function resolve(
  item: Pick<InventoryItem, 'sku' | 'barcode'>,
  index: FeedIndex
): MatchResult {
  const normalizedSku = normalize(item.sku);
  if (normalizedSku) {
    const record = index.bySku.get(normalizedSku);
    if (record) return { feedRecord: record, matchedVia: 'SKU', consumedSku: normalizedSku };
  }

  // The barcode path consumes the matched record's own SKU, not the item's.
  const normalizedBarcode = normalize(item.barcode);
  if (normalizedBarcode) {
    const record = index.byBarcode.get(normalizedBarcode);
    if (record) {
      return { feedRecord: record, matchedVia: 'BARCODE', consumedSku: record.normalizedSku };
    }
  }

  return { feedRecord: null, matchedVia: 'NONE', consumedSku: null };
}

function logNote(params: {
  item: InventoryItem;
  feedRecord: FeedRecord | null;
  tier: number;
  alert: boolean;
  hasSku: boolean;
  hasBarcode: boolean;
}): string {
  const { item, feedRecord, tier, alert, hasSku, hasBarcode } = params;
  if (!hasSku && !hasBarcode) return 'SKIPPED: missing SKU and barcode';

  let note: string;
  if (!feedRecord) note = 'No feed match; treated as zero inventory';
  else if (alert) note = 'LOW STOCK';
  else if (tier !== item.quantityOnHand) note = `Stock updated: ${item.quantityOnHand} → ${tier}`;
  else note = 'Stock OK';

  if (feedRecord && !(hasSku && hasBarcode)) {
    const missing = hasSku ? 'barcode' : 'SKU';
    note += ` (missing ${missing} - UNPUBLISHED)`;
  }
  return note;
}

/**
 * Full per-item decision. Pure: the driver applies the outcome through the store.
 */
export function reconcileItem(item: InventoryItem, index: FeedIndex): ItemOutcome {
  const hasSku = isValidIdentifier(item.sku);
  const hasBarcode = isValidIdentifier(item.barcode);
  const match = resolve(item, index);
  const feedRecord = match.feedRecord;

  const rawQuantity = feedRecord?.rawQuantity ?? 0;
  const tier = quantityTier(rawQuantity);
  const alert = isAlert(tier);
  const decision = computePublishDecision(item);

  const displaySku = sanitize(item.sku) || `NO_SKU_${item.id}`;
  const displayBarcode = sanitize(item.barcode) || null;

  const logEntry: ReconciliationLogEntry = {
    sku: displaySku,
    barcode: displayBarcode,
    externalId: feedRecord?.externalId ?? null,
    brand: feedRecord?.brand ?? null,
    resolvedQuantity: tier,
    alertFlag: alert,
    note: logNote({ item, feedRecord, tier, alert, hasSku, hasBarcode }),
  };

  const unpublishedEntry: UnpublishedProductEntry | null = decision.reason
    ? {
        sku: displaySku,
        barcode: displayBarcode,
        externalId: feedRecord?.externalId ?? null,
        brand: feedRecord ? feedRecord.brand : (item.brand ?? 'Unknown'),
        quantity: rawQuantity,
        missingFields: decision.missingFields,
        note: feedRecord
          ? `Product unpublished: ${decision.reason}. Feed quantity: ${rawQuantity}`
          : `Product unpublished: ${decision.reason}. No feed data found`,
      }
    : null;

  const stockMutation: StockMutation | null = shouldMutateStock(item, tier)
    ? { previousQuantity: item.quantityOnHand, newQuantity: tier }
    : null;

  return {
    itemId: item.id,
    match,
    tier,
    alert,
    publish: decision.publish,
    logEntry,
    unpublishedEntry,
    stockMutation,
  };
}
