/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Unknown fields are rejected (strict).
 * - 100 chars matches the column width.
 * - Passwords are also capped in UTF-8 bytes: bcrypt ignores everything past 72,
 *   so two longer passwords with the same prefix would verify against each other.
 */

import { z } from 'zod';
import { BCRYPT_MAX_PASSWORD_BYTES } from '../../shared/security/bcrypt-password-hasher';
import { entityIdSchema } from '../../shared/validation/zod-helpers';

export const createUserSchema = z
  .object({
    mail: z.string().min(1).max(100),
    password: z
      .string()
      .min(1)
      .max(100)
      .refine(
        (p) => Buffer.byteLength(p, 'utf8') <= BCRYPT_MAX_PASSWORD_BYTES,
        `Password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes`,
      ),
  })
  .strict();

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const userIdParamsSchema = z.object({
  userId: entityIdSchema,
});
