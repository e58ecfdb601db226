import { sql } from 'drizzle-orm';
import { boolean, index, integer, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';

export const inventoryItems = pgTable(
  'inventory_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: text('name').notNull(),
    sku: text('sku'),
    barcode: text('barcode'),
    brand: text('brand'),

    // stockable | consumable | service
    itemType: text('item_type').notNull().default('stockable'),
    active: boolean('active').notNull().default(true),
    isPublished: boolean('is_published').notNull().default(false),
    quantityOnHand: integer('quantity_on_hand').notNull().default(0),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_inventory_items_type').on(table.itemType),
    index('idx_inventory_items_sku_relaxed').on(
      sql`upper(regexp_replace(${table.sku}, '[^0-9A-Za-z]+', '', 'g'))`
    ),
  ]
);

export const stockAdjustments = pgTable(
  'stock_adjustments',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    itemId: uuid('item_id')
      .notNull()
      .references(() => inventoryItems.id, { onDelete: 'cascade' }),
    previousQuantity: integer('previous_quantity').notNull(),
    newQuantity: integer('new_quantity').notNull(),
    reason: text('reason').notNull().default('reconcile'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_stock_adjustments_item').on(table.itemId)]
);

export type InventoryItemRow = typeof inventoryItems.$inferSelect;
export type NewInventoryItemRow = typeof inventoryItems.$inferInsert;
export type StockAdjustmentRow = typeof stockAdjustments.$inferSelect;
