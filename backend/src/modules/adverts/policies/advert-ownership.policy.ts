/**
 * backend/src/modules/adverts/policies/advert-ownership.policy.ts
 *
 * WHY:
 * - Centralizes the "who may delete an advert" rule.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Must be evaluated BEFORE the delete is issued.
 */

import { ok, err, type Result } from '../../../shared/http/result';
import type { User } from '../../users';
import { AdvertErrors } from '../advert.errors';
import type { Advert } from '../advert.types';

export function authorizeAdvertOwner(
  actor: Pick<User, 'id'>,
  advert: Pick<Advert, 'id' | 'ownerId'>,
): Result<void> {
  if (actor.id !== advert.ownerId) {
    return err(AdvertErrors.notOwner({ advertId: advert.id, actorId: actor.id }));
  }
  return ok(undefined);
}
