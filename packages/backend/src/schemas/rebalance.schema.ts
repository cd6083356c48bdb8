import { z } from 'zod';

export const rebalanceQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

export type RebalanceQuery = z.infer<typeof rebalanceQuerySchema>;
