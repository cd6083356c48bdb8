import { z } from 'zod';

// ============================================================================
// Library Schemas
// ============================================================================

export const libraryIdParamsSchema = z.object({
  id: z.coerce.number().int().positive('Library id must be a positive integer'),
});

export type LibraryIdParams = z.infer<typeof libraryIdParamsSchema>;

export const createLibrarySchema = z
  .object({
    id: z.number().int().positive().optional(),
    name: z.string().trim().min(1, 'Name is required').max(255),
    capacity: z.number().int().positive('Capacity must be a positive integer'),
    bookCount: z.number().int().nonnegative('Book count must be non-negative').optional().default(0),
  })
  .refine((data) => data.bookCount <= data.capacity, {
    message: 'Book count cannot exceed capacity',
    path: ['bookCount'],
  });

export type CreateLibraryInput = z.infer<typeof createLibrarySchema>;

export const updateLibrarySchema = z
  .object({
    name: z.string().trim().min(1).max(255).optional(),
    capacity: z.number().int().positive('Capacity must be a positive integer').optional(),
    bookCount: z.number().int().nonnegative('Book count must be non-negative').optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

export type UpdateLibraryInput = z.infer<typeof updateLibrarySchema>;
