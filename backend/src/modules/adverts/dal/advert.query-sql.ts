/**
 * backend/src/modules/adverts/dal/advert.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for adverts (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { AppAdverts } from '../../../shared/db/db.schema';

export type AdvertRow = Selectable<AppAdverts>;

export async function selectAdvertByIdSql(
  db: DbExecutor,
  advertId: number,
): Promise<AdvertRow | undefined> {
  return db.selectFrom('app_adverts').selectAll().where('id', '=', advertId).executeTakeFirst();
}
