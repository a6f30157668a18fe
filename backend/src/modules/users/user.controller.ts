/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload/params and shapes the response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod before any repository access; return Results, never throw.
 */

import type { FastifyRequest } from 'fastify';

import type { UnitOfWork } from '../../shared/db/unit-of-work';
import { err, ok, type Result } from '../../shared/http/result';
import { parseWith } from '../../shared/validation/zod-helpers';

import type { DeletedAck } from './dal/user.repo';
import type { UserService } from './user.service';
import { createUserSchema, userIdParamsSchema } from './user.schemas';
import { UserErrors } from './user.errors';
import type { User, UserId } from './user.types';

/**
 * Wire shape of a user.
 * NOTE: `password` is the stored bcrypt hash. Exposing it is kept for compatibility
 * with existing clients; see DESIGN.md before relying on it.
 */
export type UserResponse = {
  id: UserId;
  mail: string;
  password: string;
};

export function toUserResponse(user: User): UserResponse {
  return { id: user.id, mail: user.mail, password: user.passwordHash };
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  private parseUserId(req: FastifyRequest): Result<UserId> {
    const parsed = userIdParamsSchema.safeParse(req.params);
    // the route only matches digits; anything left over cannot name a row
    if (!parsed.success) return err(UserErrors.userNotFound());
    return ok(parsed.data.userId);
  }

  async create(req: FastifyRequest, uow: UnitOfWork): Promise<Result<{ id: UserId }>> {
    const body = parseWith(createUserSchema, req.body);
    if (!body.ok) return body;

    return this.userService.registerUser(uow, {
      ...body.value,
      requestId: req.requestContext.requestId,
    });
  }

  async read(req: FastifyRequest, uow: UnitOfWork): Promise<Result<UserResponse>> {
    const userId = this.parseUserId(req);
    if (!userId.ok) return userId;

    const user = await this.userService.getUser(uow, userId.value);
    if (!user.ok) return user;

    return ok(toUserResponse(user.value));
  }

  async remove(req: FastifyRequest, uow: UnitOfWork): Promise<Result<DeletedAck>> {
    const userId = this.parseUserId(req);
    if (!userId.ok) return userId;

    return this.userService.deleteUser(uow, {
      userId: userId.value,
      requestId: req.requestContext.requestId,
    });
  }
}
