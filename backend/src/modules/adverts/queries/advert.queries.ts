/**
 * backend/src/modules/adverts/queries/advert.queries.ts
 *
 * WHY:
 * - Shapes advert rows into the Advert domain type.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectAdvertByIdSql } from '../dal/advert.query-sql';
import type { AdvertRow } from '../dal/advert.query-sql';
import type { Advert } from '../advert.types';

function toAdvert(row: AdvertRow): Advert {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
    ownerId: row.owner_id,
  };
}

export async function getAdvertById(db: DbExecutor, advertId: number): Promise<Advert | undefined> {
  const row = await selectAdvertByIdSql(db, advertId);
  if (!row) return undefined;
  return toAdvert(row);
}
