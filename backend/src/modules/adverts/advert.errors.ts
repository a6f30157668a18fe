/**
 * backend/src/modules/adverts/advert.errors.ts
 *
 * WHY:
 * - Adverts module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AdvertErrors = {
  advertNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Advert not found', meta);
  },

  advertAlreadyExists(meta?: AppErrorMeta) {
    return AppError.conflict('Advert already exists', meta);
  },

  notOwner(meta?: AppErrorMeta) {
    return AppError.forbidden('User is not the owner', meta);
  },
} as const;
