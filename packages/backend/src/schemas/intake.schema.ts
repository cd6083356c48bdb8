import { z } from 'zod';

// ============================================================================
// Intake Schemas
// ============================================================================

export const intakePolicySchema = z.enum(['clamp', 'reject']);

export const intakeSchema = z.object({
  // Lowest library id when omitted
  libraryId: z.number().int().positive().optional(),
  quantity: z.number().int().positive('Quantity must be a positive integer'),
  policy: intakePolicySchema.optional(),
});

export type IntakeInput = z.infer<typeof intakeSchema>;
