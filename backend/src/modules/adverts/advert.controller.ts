/**
 * backend/src/modules/adverts/advert.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for adverts.
 * - Validates payload/params and shapes the response (ISO-8601 created_at).
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Return Results, never throw.
 */

import type { FastifyRequest } from 'fastify';

import type { UnitOfWork } from '../../shared/db/unit-of-work';
import { err, ok, type Result } from '../../shared/http/result';
import { parseWith } from '../../shared/validation/zod-helpers';
import type { DeletedAck, UserId } from '../users';

import type { AdvertService } from './advert.service';
import { advertIdParamsSchema, createAdvertSchema, deleteAdvertSchema } from './advert.schemas';
import { AdvertErrors } from './advert.errors';
import type { Advert, AdvertId } from './advert.types';

export type AdvertResponse = {
  id: AdvertId;
  name: string;
  description: string;
  created_at: string;
  owner_id: UserId;
};

export function toAdvertResponse(advert: Advert): AdvertResponse {
  return {
    id: advert.id,
    name: advert.name,
    description: advert.description,
    created_at: advert.createdAt.toISOString(),
    owner_id: advert.ownerId,
  };
}

export class AdvertController {
  constructor(private readonly advertService: AdvertService) {}

  private parseAdvertId(req: FastifyRequest): Result<AdvertId> {
    const parsed = advertIdParamsSchema.safeParse(req.params);
    if (!parsed.success) return err(AdvertErrors.advertNotFound());
    return ok(parsed.data.advertId);
  }

  async create(req: FastifyRequest, uow: UnitOfWork): Promise<Result<{ id: AdvertId }>> {
    const body = parseWith(createAdvertSchema, req.body);
    if (!body.ok) return body;

    return this.advertService.submitAdvert(uow, {
      name: body.value.name,
      description: body.value.description,
      ownerId: body.value.owner_id,
      requestId: req.requestContext.requestId,
    });
  }

  async read(req: FastifyRequest, uow: UnitOfWork): Promise<Result<AdvertResponse>> {
    const advertId = this.parseAdvertId(req);
    if (!advertId.ok) return advertId;

    const advert = await this.advertService.getAdvert(uow, advertId.value);
    if (!advert.ok) return advert;

    return ok(toAdvertResponse(advert.value));
  }

  async remove(req: FastifyRequest, uow: UnitOfWork): Promise<Result<DeletedAck>> {
    const advertId = this.parseAdvertId(req);
    if (!advertId.ok) return advertId;

    return this.advertService.deleteAdvert(uow, {
      advertId: advertId.value,
      requestId: req.requestContext.requestId,
      resolveActorId: () => {
        const body = parseWith(deleteAdvertSchema, req.body ?? {});
        if (!body.ok) return body;
        return ok(body.value.owner_id);
      },
    });
  }
}
