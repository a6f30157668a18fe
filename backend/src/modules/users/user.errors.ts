/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  userAlreadyExists(meta?: AppErrorMeta) {
    return AppError.conflict('User already exists', meta);
  },
} as const;
