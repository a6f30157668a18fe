/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { AppUsers } from '../../../shared/db/db.schema';

export type UserRow = Selectable<AppUsers>;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('app_users').selectAll().where('id', '=', userId).executeTakeFirst();
}
