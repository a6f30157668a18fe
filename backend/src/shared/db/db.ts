/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Optional query logging replaces an ORM "echo" flag.
 *
 * HOW TO USE:
 * - createDb(config.databaseUrl, { logQueries }) once, in app/di.ts.
 * - Tests build a Kysely<DB> over an in-process Postgres and inject it instead.
 */

import pg from 'pg';
import { Kysely, PostgresDialect, type LogEvent } from 'kysely';

import type { DB } from './db.schema';
import { logger } from '../logger/logger';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both the main DB and a transaction (`trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function logQueryEvent(event: LogEvent): void {
  logger.debug('db.query', {
    flow: 'db',
    level: event.level,
    sql: event.query.sql,
    durationMs: event.queryDurationMillis,
    ...(event.level === 'error' ? { err: event.error } : {}),
  });
}

export function createDb(databaseUrl: string, opts: { logQueries?: boolean } = {}): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
    log: opts.logQueries ? logQueryEvent : undefined,
  });
}
