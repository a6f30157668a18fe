/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db) and shares them safely.
 * - Keeps modules testable: a prebuilt Db (e.g. in-process Postgres) can be injected.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAdvertModule } from '../modules/adverts/advert.module';
import type { AdvertModule } from '../modules/adverts/advert.module';

export type AppDeps = {
  db: Db;
  logger: Logger;
  passwordHasher: PasswordHasher;

  // modules
  users: UserModule;
  adverts: AdvertModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
  passwordHasher?: PasswordHasher;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const db = overrides.db ?? createDb(config.databaseUrl, { logQueries: config.logQueries });

  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db, passwordHasher, logger });
  const adverts = createAdvertModule({ db, logger, userRepo: users.userRepo });

  return {
    db,
    logger,
    passwordHasher,
    users,
    adverts,
    close: async () => {
      await db.destroy();
    },
  };
}
