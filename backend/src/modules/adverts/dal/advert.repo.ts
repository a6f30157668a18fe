/**
 * backend/src/modules/adverts/dal/advert.repo.ts
 *
 * WHY:
 * - Guarded advert persistence; storage failures come back as domain Results.
 *
 * RULES:
 * - No transactions started here; the caller passes the request's UnitOfWork.
 * - No ownership checks here (see policies/advert-ownership.policy.ts).
 */

import type { UnitOfWork } from '../../../shared/db/unit-of-work';
import { err, ok, type Result } from '../../../shared/http/result';
import type { DeletedAck } from '../../users';
import { deleteAdvertByIdSql, insertAdvertSql } from './advert.mutation-sql';
import { getAdvertById } from '../queries/advert.queries';
import { AdvertErrors } from '../advert.errors';
import type { Advert, AdvertId, NewAdvert } from '../advert.types';

export class AdvertRepo {
  async fetchOrNotFound(uow: UnitOfWork, advertId: AdvertId): Promise<Result<Advert>> {
    const advert = await uow.get((db) => getAdvertById(db, advertId));
    if (!advert) return err(AdvertErrors.advertNotFound({ advertId }));
    return ok(advert);
  }

  /** Name must be globally unique (enforced by DB constraint). */
  async create(uow: UnitOfWork, advert: NewAdvert): Promise<Result<{ id: AdvertId }>> {
    const outcome = await uow.insert((db) => insertAdvertSql(db, advert));

    if (outcome.status === 'conflict') {
      return err(AdvertErrors.advertAlreadyExists({ constraint: outcome.constraint }));
    }
    return ok({ id: outcome.value.id });
  }

  async remove(uow: UnitOfWork, advert: Advert): Promise<Result<DeletedAck>> {
    const deleted = await uow.delete((db) => deleteAdvertByIdSql(db, advert.id));
    if (deleted === 0n) return err(AdvertErrors.advertNotFound({ advertId: advert.id }));
    return ok({ status: 'deleted' });
  }
}
