/**
 * backend/src/shared/db/db.schema.ts
 *
 * WHY:
 * - Kysely needs the table shapes to type every query.
 * - Two tables only, so the interface is written by hand and kept next to
 *   ensure-schema.ts, which creates exactly these columns.
 *
 * RULES:
 * - Column names stay snake_case here; modules map rows to camelCase domain types.
 * - Change both files together.
 */

import type { Generated } from 'kysely';

export interface AppUsers {
  id: Generated<number>;
  mail: string;
  // bcrypt hash, never the plaintext
  password: string;
}

export interface AppAdverts {
  id: Generated<number>;
  name: string;
  description: string;
  created_at: Generated<Date>;
  // weak reference to app_users.id (no FK, no cascade)
  owner_id: number;
}

export interface DB {
  app_users: AppUsers;
  app_adverts: AppAdverts;
}
