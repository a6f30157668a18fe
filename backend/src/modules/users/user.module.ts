/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Exposes userRepo so other modules (adverts) can resolve acting users.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Db } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';

import { UserRepo } from './dal/user.repo';
import { UserController } from './user.controller';
import { registerUserRoutes } from './user.routes';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: Db; passwordHasher: PasswordHasher; logger: Logger }) {
  const userRepo = new UserRepo();

  const userService = new UserService({
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    userRepo,
  });

  const controller = new UserController(userService);

  return {
    userRepo,
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, deps.db, controller);
    },
  };
}
