/**
 * backend/src/modules/adverts/advert.routes.ts
 *
 * WHY:
 * - Declares Adverts module endpoints.
 *
 * RULES:
 * - No business logic here.
 * - Every route runs inside its own UnitOfWork.
 */

import type { FastifyInstance } from 'fastify';
import type { Db } from '../../shared/db/db';
import { withUnitOfWork } from '../../shared/http/unit-of-work-handler';
import type { AdvertController } from './advert.controller';

export function registerAdvertRoutes(app: FastifyInstance, db: Db, controller: AdvertController) {
  app.post('/advert', withUnitOfWork(db, (req, uow) => controller.create(req, uow)));
  app.get('/advert/:advertId(^\\d+$)', withUnitOfWork(db, (req, uow) => controller.read(req, uow)));
  app.delete(
    '/advert/:advertId(^\\d+$)',
    withUnitOfWork(db, (req, uow) => controller.remove(req, uow)),
  );
}
