/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Guarded user persistence: every path that can fail at the storage boundary
 *   comes back as a domain Result (NOT_FOUND / CONFLICT), never a raw DB error.
 *
 * RULES:
 * - No transactions started here; the caller passes the request's UnitOfWork.
 * - No policies, no hashing.
 */

import type { UnitOfWork } from '../../../shared/db/unit-of-work';
import { err, ok, type Result } from '../../../shared/http/result';
import { deleteUserByIdSql, insertUserSql } from './user.mutation-sql';
import { getUserById } from '../queries/user.queries';
import { UserErrors } from '../user.errors';
import type { NewUser, User, UserId } from '../user.types';

export type DeletedAck = { status: 'deleted' };

export class UserRepo {
  async fetchOrNotFound(uow: UnitOfWork, userId: UserId): Promise<Result<User>> {
    const user = await uow.get((db) => getUserById(db, userId));
    if (!user) return err(UserErrors.userNotFound({ userId }));
    return ok(user);
  }

  /**
   * Mail must be globally unique (enforced by DB constraint).
   * A duplicate leaves no row behind: the insert is rolled back to its savepoint.
   */
  async create(uow: UnitOfWork, user: NewUser): Promise<Result<{ id: UserId }>> {
    const outcome = await uow.insert((db) => insertUserSql(db, user));

    if (outcome.status === 'conflict') {
      return err(UserErrors.userAlreadyExists({ constraint: outcome.constraint }));
    }
    return ok({ id: outcome.value.id });
  }

  /**
   * The row can vanish between fetch and delete (a concurrent delete committed in
   * between); nothing deleted is NOT_FOUND, not success.
   */
  async remove(uow: UnitOfWork, user: User): Promise<Result<DeletedAck>> {
    const deleted = await uow.delete((db) => deleteUserByIdSql(db, user.id));
    if (deleted === 0n) return err(UserErrors.userNotFound({ userId: user.id }));
    return ok({ status: 'deleted' });
  }
}
