import type { InventoryItem, MissingField } from '@app/types';

import { isValidIdentifier } from './normalizer.js';

export const ALERT_THRESHOLD = 5;

/**
 * Maps a raw warehouse quantity to the quantity exposed locally.
 *
 * | raw          | tier |
 * |--------------|------|
 * | 0            | 0    |
 * | 30..50       | 2    |
 * | (0, 30)      | 0    |
 * | (50, 200)    | 5    |
 * | >= 200       | 10   |
 */
export function quantityTier(rawQuantity: number): number {
  if (rawQuantity === 0) return 0;
  if (rawQuantity >= 30 && rawQuantity <= 50) return 2;
  if (rawQuantity < 30) return 0;
  if (rawQuantity < 200) return 5;
  return 10;
}

export function isAlert(tier: number): boolean {
  return tier < ALERT_THRESHOLD;
}

export type UnpublishReason = 'Missing both SKU and barcode' | 'Missing SKU' | 'Missing barcode';

export type PublishDecision = Readonly<{
  publish: boolean;
  missingFields: MissingField[];
  reason: UnpublishReason | null;
}>;

export function computePublishDecision(
  item: Pick<InventoryItem, 'sku' | 'barcode'>
): PublishDecision {
  const hasSku = isValidIdentifier(item.sku);
  const hasBarcode = isValidIdentifier(item.barcode);

  if (hasSku && hasBarcode) return { publish: true, missingFields: [], reason: null };
  if (!hasSku && !hasBarcode) {
    return {
      publish: false,
      missingFields: ['SKU', 'barcode'],
      reason: 'Missing both SKU and barcode',
    };
  }
  if (!hasSku) return { publish: false, missingFields: ['SKU'], reason: 'Missing SKU' };
  return { publish: false, missingFields: ['barcode'], reason: 'Missing barcode' };
}

export function shouldPublish(item: Pick<InventoryItem, 'sku' | 'barcode'>): boolean {
  return computePublishDecision(item).publish;
}

export function shouldMutateStock(
  item: Pick<InventoryItem, 'sku' | 'barcode' | 'isStockable' | 'quantityOnHand'>,
  tier: number
): boolean {
  if (!item.isStockable) return false;
  if (!isValidIdentifier(item.sku) && !isValidIdentifier(item.barcode)) return false;
  return tier !== item.quantityOnHand;
}
