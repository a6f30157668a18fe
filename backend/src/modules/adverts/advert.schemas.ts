/**
 * backend/src/modules/adverts/advert.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Adverts module.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Create payloads are strict; owner_id accepts a number or a digit string ("3" → 3).
 * - The delete payload only reads owner_id; a missing one resolves to no user.
 */

import { z } from 'zod';
import { PG_INT_MAX, entityIdSchema, intInRange } from '../../shared/validation/zod-helpers';

export const createAdvertSchema = z
  .object({
    name: z.string().min(1).max(100),
    description: z.string().min(1).max(100),
    owner_id: entityIdSchema,
  })
  .strict();

export type CreateAdvertInput = z.infer<typeof createAdvertSchema>;

export const deleteAdvertSchema = z.object({
  owner_id: intInRange(0, PG_INT_MAX).default(0),
});

export type DeleteAdvertInput = z.infer<typeof deleteAdvertSchema>;

export const advertIdParamsSchema = z.object({
  advertId: entityIdSchema,
});
