import { z } from 'zod';

export const seedHoldingsSchema = z.enum(['none', 'all_to_first', 'random']);

export type SeedHoldings = z.infer<typeof seedHoldingsSchema>;

export const seedLibrarySchema = z.object({
  id: z.number().int().positive(),
  name: z.string().trim().min(1).max(255),
  capacity: z.number().int().positive(),
  bookCount: z.number().int().nonnegative().optional(),
});

export const seedFileSchema = z.object({
  libraries: z.array(seedLibrarySchema).min(1, 'Seed file must list at least one library'),
  // Stock distributed by the all_to_first and random scenarios
  totalBooks: z.number().int().nonnegative().optional(),
});

export type SeedFile = z.infer<typeof seedFileSchema>;
