/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user registration, lookup and deletion.
 * - Hashes passwords before they reach the DAL.
 *
 * RULES:
 * - Runs inside the request's UnitOfWork (never starts its own transaction).
 * - Never logs passwords or hashes.
 */

import type { UnitOfWork } from '../../shared/db/unit-of-work';
import type { Result } from '../../shared/http/result';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';

import type { DeletedAck, UserRepo } from './dal/user.repo';
import type { CreateUserInput } from './user.schemas';
import type { User, UserId } from './user.types';

export type RegisterUserParams = CreateUserInput & { requestId: string };

export class UserService {
  constructor(
    private readonly deps: {
      passwordHasher: PasswordHasher;
      logger: Logger;
      userRepo: UserRepo;
    },
  ) {}

  async registerUser(uow: UnitOfWork, params: RegisterUserParams): Promise<Result<{ id: UserId }>> {
    const passwordHash = await this.deps.passwordHasher.hash(params.password);

    const created = await this.deps.userRepo.create(uow, { mail: params.mail, passwordHash });

    this.deps.logger.info({
      msg: created.ok ? 'users.register.success' : 'users.register.rejected',
      flow: 'users.register',
      requestId: params.requestId,
      userId: created.ok ? created.value.id : null,
    });

    return created;
  }

  async getUser(uow: UnitOfWork, userId: UserId): Promise<Result<User>> {
    return this.deps.userRepo.fetchOrNotFound(uow, userId);
  }

  async deleteUser(
    uow: UnitOfWork,
    params: { userId: UserId; requestId: string },
  ): Promise<Result<DeletedAck>> {
    const user = await this.deps.userRepo.fetchOrNotFound(uow, params.userId);
    if (!user.ok) return user;

    // Adverts keep their owner_id: the reference is weak, nothing cascades.
    const removed = await this.deps.userRepo.remove(uow, user.value);
    if (!removed.ok) return removed;

    this.deps.logger.info({
      msg: 'users.delete.success',
      flow: 'users.delete',
      requestId: params.requestId,
      userId: params.userId,
    });

    return removed;
  }
}
