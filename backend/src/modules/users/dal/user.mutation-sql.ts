/**
 * backend/src/modules/users/dal/user.mutation-sql.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError. Unique violations propagate to the UnitOfWork.
 * - No transactions started here.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { NewUser } from '../user.types';

export async function insertUserSql(db: DbExecutor, user: NewUser): Promise<{ id: number }> {
  return db
    .insertInto('app_users')
    .values({ mail: user.mail, password: user.passwordHash })
    .returning('id')
    .executeTakeFirstOrThrow();
}

export async function deleteUserByIdSql(db: DbExecutor, userId: number): Promise<bigint> {
  const res = await db.deleteFrom('app_users').where('id', '=', userId).executeTakeFirst();
  return res.numDeletedRows;
}
