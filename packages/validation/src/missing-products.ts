import { z } from 'zod';

export const MissingProductListQuerySchema = z.object({
  status: z.enum(['missing', 'created', 'ignored']).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export type MissingProductListQuery = z.infer<typeof MissingProductListQuerySchema>;

export const MissingProductParamsSchema = z.object({
  id: z.string().uuid('Invalid missing product id'),
});

export type MissingProductParams = z.infer<typeof MissingProductParamsSchema>;
