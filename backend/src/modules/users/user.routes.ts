/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Every route runs inside its own UnitOfWork.
 * - Ids must be all digits; anything else never reaches a handler (404).
 */

import type { FastifyInstance } from 'fastify';
import type { Db } from '../../shared/db/db';
import { withUnitOfWork } from '../../shared/http/unit-of-work-handler';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, db: Db, controller: UserController) {
  app.post('/user', withUnitOfWork(db, (req, uow) => controller.create(req, uow)));
  app.get('/user/:userId(^\\d+$)', withUnitOfWork(db, (req, uow) => controller.read(req, uow)));
  app.delete('/user/:userId(^\\d+$)', withUnitOfWork(db, (req, uow) => controller.remove(req, uow)));
}
