/**
 * backend/src/shared/db/unit-of-work.ts
 *
 * WHY:
 * - One request = one transaction = one connection.
 * - All writes of a request commit together, or none do.
 * - Handlers receive the unit explicitly; nothing hangs off the request object.
 *
 * HOW IT WORKS:
 * 1. runInUnitOfWork() opens a Kysely transaction and hands a UnitOfWork to `work`.
 * 2. `work` returns a Result. ok → commit. error → rollback, error returned as a value.
 * 3. A thrown error or an aborted signal also rolls back; the error propagates.
 * 4. Kysely releases the connection on every exit path.
 *
 * RULES:
 * - Repositories go through get/insert/delete; never the root Db.
 * - insert() runs inside a savepoint so a unique violation leaves the unit exactly
 *   as it was before the call.
 */

import { sql } from 'kysely';

import type { Db, DbExecutor } from './db';
import { asUniqueViolation } from './pg-errors';
import type { AppError } from '../http/errors';
import { err, type Result } from '../http/result';
import { logger } from '../logger/logger';

export type InsertOutcome<T> =
  | { status: 'inserted'; value: T }
  | { status: 'conflict'; constraint: string | null };

export class UnitOfWork {
  private savepointSeq = 0;

  constructor(
    private readonly trx: DbExecutor,
    private readonly signal: AbortSignal,
  ) {}

  async get<T>(op: (db: DbExecutor) => Promise<T | undefined>): Promise<T | undefined> {
    this.signal.throwIfAborted();
    return op(this.trx);
  }

  async insert<T>(op: (db: DbExecutor) => Promise<T>): Promise<InsertOutcome<T>> {
    this.signal.throwIfAborted();

    const savepoint = sql.id(`uow_insert_${++this.savepointSeq}`);
    await sql`savepoint ${savepoint}`.execute(this.trx);

    try {
      const value = await op(this.trx);
      await sql`release savepoint ${savepoint}`.execute(this.trx);
      return { status: 'inserted', value };
    } catch (error: unknown) {
      const violation = asUniqueViolation(error);
      if (!violation) throw error;

      await sql`rollback to savepoint ${savepoint}`.execute(this.trx);
      return { status: 'conflict', constraint: violation.constraint };
    }
  }

  /** Resolves to the number of rows the delete matched. */
  async delete(op: (db: DbExecutor) => Promise<bigint>): Promise<bigint> {
    this.signal.throwIfAborted();
    return op(this.trx);
  }
}

class RollbackWithError extends Error {
  constructor(readonly appError: AppError) {
    super(appError.message);
    this.name = 'RollbackWithError';
  }
}

export async function runInUnitOfWork<T>(
  db: Db,
  signal: AbortSignal,
  work: (uow: UnitOfWork) => Promise<Result<T>>,
): Promise<Result<T>> {
  signal.throwIfAborted();

  try {
    return await db.transaction().execute(async (trx) => {
      const result = await work(new UnitOfWork(trx, signal));

      // Kysely rolls back when the callback throws, so an error value is thrown here
      // and turned back into a value below.
      if (!result.ok) throw new RollbackWithError(result.error);

      // abandoned after the last write but before commit
      signal.throwIfAborted();
      return result;
    });
  } catch (error: unknown) {
    if (error instanceof RollbackWithError) {
      logger.debug('uow.rollback', { flow: 'uow', code: error.appError.code });
      return err(error.appError);
    }

    logger.warn('uow.rollback', {
      flow: 'uow',
      aborted: signal.aborted,
      message: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
