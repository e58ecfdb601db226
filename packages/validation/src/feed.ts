import { z } from 'zod';

/**
 * Identifier columns arrive as strings, numbers (barcodes encoded as JSON numbers) or null.
 * Sanitizing placeholders is the normalizer's job, not the schema's.
 */
const FeedScalarSchema = z.union([z.string(), z.number(), z.null()]).optional();

const FeedQuantitySchema = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === null) return 0;
    const quantity = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(quantity) || quantity < 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'southbayStock must be a non-negative number',
      });
      return z.NEVER;
    }
    return quantity;
  });

export const FeedItemSchema = z.object({
  sku: FeedScalarSchema,
  barcode: FeedScalarSchema,
  brand: FeedScalarSchema,
  itemNumber: FeedScalarSchema,
  southbayStock: FeedQuantitySchema,
});

export type FeedItemInput = z.input<typeof FeedItemSchema>;
export type FeedItem = z.output<typeof FeedItemSchema>;

export const FeedEnvelopeSchema = z.object({
  success: z.literal(true),
  data: z.array(z.unknown()),
});

export type FeedEnvelope = z.infer<typeof FeedEnvelopeSchema>;
