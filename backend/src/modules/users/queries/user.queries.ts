/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserByIdSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User } from '../user.types';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    mail: row.mail,
    passwordHash: row.password,
  };
}

export async function getUserById(db: DbExecutor, userId: number): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}
