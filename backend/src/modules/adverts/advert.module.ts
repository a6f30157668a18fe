/**
 * backend/src/modules/adverts/advert.module.ts
 *
 * WHY:
 * - Encapsulates Adverts module wiring.
 * - Consumes the Users module's repo to resolve the acting user on delete.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Db } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { UserRepo } from '../users';

import { AdvertRepo } from './dal/advert.repo';
import { AdvertController } from './advert.controller';
import { registerAdvertRoutes } from './advert.routes';
import { AdvertService } from './advert.service';

export type AdvertModule = ReturnType<typeof createAdvertModule>;

export function createAdvertModule(deps: { db: Db; logger: Logger; userRepo: UserRepo }) {
  const advertRepo = new AdvertRepo();

  const advertService = new AdvertService({
    logger: deps.logger,
    advertRepo,
    userRepo: deps.userRepo,
  });

  const controller = new AdvertController(advertService);

  return {
    advertRepo,
    advertService,
    registerRoutes(app: FastifyInstance) {
      registerAdvertRoutes(app, deps.db, controller);
    },
  };
}
