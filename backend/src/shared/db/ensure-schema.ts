/**
 * backend/src/shared/db/ensure-schema.ts
 *
 * WHY:
 * - The service owns two tables and creates them at startup if they are missing.
 * - There is no migration history: `if not exists` makes every boot idempotent.
 *
 * RULES:
 * - Keep in sync with db.schema.ts.
 * - Uniqueness lives in the database (mail, name); the app only maps violations.
 */

import { sql } from 'kysely';
import type { Db } from './db';
import { logger } from '../logger/logger';

export const USERS_MAIL_UNIQUE = 'app_users_mail_key';
export const ADVERTS_NAME_UNIQUE = 'app_adverts_name_key';

export async function ensureSchema(db: Db): Promise<void> {
  await db.schema
    .createTable('app_users')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('mail', 'varchar(100)', (col) => col.notNull())
    .addColumn('password', 'varchar(100)', (col) => col.notNull())
    .addUniqueConstraint(USERS_MAIL_UNIQUE, ['mail'])
    .execute();

  await db.schema
    .createTable('app_adverts')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar(100)', (col) => col.notNull())
    .addColumn('description', 'varchar(100)', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('owner_id', 'integer', (col) => col.notNull())
    .addUniqueConstraint(ADVERTS_NAME_UNIQUE, ['name'])
    .execute();

  logger.info('schema.ensured', { flow: 'db', tables: ['app_users', 'app_adverts'] });
}
