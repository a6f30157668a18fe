/**
 * backend/src/modules/adverts/advert.service.ts
 *
 * WHY:
 * - Orchestrates advert submission, lookup and owner-gated deletion.
 *
 * RULES:
 * - Runs inside the request's UnitOfWork (never starts its own transaction).
 * - Delete order is fixed: advert → acting user → ownership policy → delete.
 *
 * SECURITY:
 * - The acting user id comes from the request body, not from a verified identity.
 *   Anyone who knows an owner's id can delete that owner's adverts. See DESIGN.md.
 */

import type { UnitOfWork } from '../../shared/db/unit-of-work';
import type { Result } from '../../shared/http/result';
import type { Logger } from '../../shared/logger/logger';
import type { DeletedAck, UserId, UserRepo } from '../users';

import type { AdvertRepo } from './dal/advert.repo';
import { authorizeAdvertOwner } from './policies/advert-ownership.policy';
import type { Advert, AdvertId, NewAdvert } from './advert.types';

export class AdvertService {
  constructor(
    private readonly deps: {
      logger: Logger;
      advertRepo: AdvertRepo;
      userRepo: UserRepo;
    },
  ) {}

  async submitAdvert(
    uow: UnitOfWork,
    params: NewAdvert & { requestId: string },
  ): Promise<Result<{ id: AdvertId }>> {
    const created = await this.deps.advertRepo.create(uow, {
      name: params.name,
      description: params.description,
      ownerId: params.ownerId,
    });

    this.deps.logger.info({
      msg: created.ok ? 'adverts.submit.success' : 'adverts.submit.rejected',
      flow: 'adverts.submit',
      requestId: params.requestId,
      advertId: created.ok ? created.value.id : null,
      ownerId: params.ownerId,
    });

    return created;
  }

  async getAdvert(uow: UnitOfWork, advertId: AdvertId): Promise<Result<Advert>> {
    return this.deps.advertRepo.fetchOrNotFound(uow, advertId);
  }

  /**
   * Resolves the advert first, so an unknown advert is a 404 whatever owner_id holds.
   * `resolveActorId` runs only after that, which lets the controller validate the body late.
   * A body that is not valid JSON never gets here: Fastify rejects it with a 400 first.
   */
  async deleteAdvert(
    uow: UnitOfWork,
    params: {
      advertId: AdvertId;
      requestId: string;
      resolveActorId: () => Result<UserId>;
    },
  ): Promise<Result<DeletedAck>> {
    const advert = await this.deps.advertRepo.fetchOrNotFound(uow, params.advertId);
    if (!advert.ok) return advert;

    const actorId = params.resolveActorId();
    if (!actorId.ok) return actorId;

    const actor = await this.deps.userRepo.fetchOrNotFound(uow, actorId.value);
    if (!actor.ok) return actor;

    const allowed = authorizeAdvertOwner(actor.value, advert.value);
    if (!allowed.ok) {
      this.deps.logger.warn({
        msg: 'adverts.delete.forbidden',
        flow: 'adverts.delete',
        requestId: params.requestId,
        advertId: advert.value.id,
        actorId: actor.value.id,
      });
      return allowed;
    }

    const removed = await this.deps.advertRepo.remove(uow, advert.value);
    if (!removed.ok) return removed;

    this.deps.logger.info({
      msg: 'adverts.delete.success',
      flow: 'adverts.delete',
      requestId: params.requestId,
      advertId: advert.value.id,
      actorId: actor.value.id,
    });

    return removed;
  }
}
