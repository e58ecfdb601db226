import { z } from 'zod';

export const ReconcileSettingsUpdateSchema = z
  .object({
    prefixFilterEnabled: z.boolean(),
    allowedPrefixes: z
      .array(z.string().trim().min(1, 'Prefix must not be empty').max(32))
      .max(100, 'Too many prefixes'),
    notificationsEnabled: z.boolean(),
    recipientEmail: z.string().trim().email('Invalid email').nullable(),
    batchSize: z.number().int().min(1).max(1000),
    isolation: z.enum(['batch', 'item']),
    missingRetentionHours: z.number().int().min(1).max(24 * 90),
  })
  .partial()
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one setting must be provided',
  });

export type ReconcileSettingsUpdate = z.infer<typeof ReconcileSettingsUpdateSchema>;
