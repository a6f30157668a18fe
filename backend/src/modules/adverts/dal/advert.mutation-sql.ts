/**
 * backend/src/modules/adverts/dal/advert.mutation-sql.ts
 *
 * WHY:
 * - DAL WRITES ONLY for adverts (raw SQL access).
 *
 * RULES:
 * - No AppError. Unique violations propagate to the UnitOfWork.
 * - created_at is left to the DB default.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { NewAdvert } from '../advert.types';

export async function insertAdvertSql(db: DbExecutor, advert: NewAdvert): Promise<{ id: number }> {
  return db
    .insertInto('app_adverts')
    .values({
      name: advert.name,
      description: advert.description,
      owner_id: advert.ownerId,
    })
    .returning('id')
    .executeTakeFirstOrThrow();
}

export async function deleteAdvertByIdSql(db: DbExecutor, advertId: number): Promise<bigint> {
  const res = await db.deleteFrom('app_adverts').where('id', '=', advertId).executeTakeFirst();
  return res.numDeletedRows;
}
