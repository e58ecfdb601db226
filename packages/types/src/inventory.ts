/**
 * Inventory model as seen by the reconciliation engine.
 *
 * The store resolves `isStockable` from its own item type column; the engine never inspects
 * item types.
 */

export const INVENTORY_ITEM_TYPES = ['stockable', 'consumable', 'service'] as const;

export type InventoryItemType = (typeof INVENTORY_ITEM_TYPES)[number];

export interface InventoryItem {
  id: string;
  name: string;
  sku: string | null;
  barcode: string | null;
  brand: string | null;
  quantityOnHand: number;
  isStockable: boolean;
  isPublished: boolean;
}

export interface NewInventoryItem {
  name: string;
  sku: string;
  barcode: string | null;
  brand: string | null;
  itemType: InventoryItemType;
}

export type MissingField = 'SKU' | 'barcode';
