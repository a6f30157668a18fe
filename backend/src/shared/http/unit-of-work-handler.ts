/**
 * backend/src/shared/http/unit-of-work-handler.ts
 *
 * WHY:
 * - Binds every request to exactly one UnitOfWork for its whole lifetime.
 * - Single boundary where a handler's Result becomes a status code.
 *
 * HOW TO USE:
 * - app.get('/thing/:id', withUnitOfWork(db, (req, uow) => controller.read(req, uow)))
 *
 * RULES:
 * - Handlers never touch `reply`; they return Result values.
 * - If the client goes away before the reply is written, the unit is aborted and
 *   its transaction rolls back at the next persistence step (or before commit).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { Db } from '../db/db';
import { runInUnitOfWork, type UnitOfWork } from '../db/unit-of-work';
import { replyWithAppError } from './error-handler';
import type { Result } from './result';

export type UnitOfWorkHandler<T> = (req: FastifyRequest, uow: UnitOfWork) => Promise<Result<T>>;

export class RequestAbandonedError extends Error {
  constructor() {
    super('Request abandoned by client');
    this.name = 'RequestAbandonedError';
  }
}

export function withUnitOfWork<T>(db: Db, handler: UnitOfWorkHandler<T>) {
  return async (req: FastifyRequest, reply: FastifyReply) => {
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) controller.abort(new RequestAbandonedError());
    };
    reply.raw.once('close', onClose);

    try {
      const result = await runInUnitOfWork(db, controller.signal, (uow) => handler(req, uow));

      if (!result.ok) return replyWithAppError(req, reply, result.error);
      return reply.status(200).send(result.value);
    } finally {
      reply.raw.off('close', onClose);
    }
  };
}
