/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - The one place where domain errors become wire responses.
 * - Internal details (meta, stack traces, storage errors) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → its status + `{ error: message }`.
 * - Fastify client errors (malformed JSON, bad content type) → their 4xx status.
 * - Unmatched routes → 404.
 * - Unexpected errors → 500 with generic message.
 * - Log every error with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  error: string;
};

const SENSITIVE_META_KEYS = new Set(['password', 'passwordHash', 'token', 'secret']);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(message: string): ErrorResponseBody {
  return { error: message };
}

export function replyWithAppError(req: FastifyRequest, reply: FastifyReply, err: AppError) {
  withRequestContext(req).warn('app_error', {
    flow: 'http.error',
    code: err.code,
    status: err.status,
    message: err.message,
    meta: redactMeta(err.meta),
  });

  return reply.status(err.status).send(buildResponse(err.message));
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setNotFoundHandler((req, reply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error' });
    return reply.status(404).send(buildResponse('Not found'));
  });

  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors (normally returned as values, thrown only by mistake)
    if (err instanceof AppError) {
      return replyWithAppError(req, reply, err);
    }

    // 2) Client errors raised by Fastify itself (body parsing, content type)
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      log.warn('client_error', {
        flow: 'http.error',
        code: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse(err.message));
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('Internal server error'));
  });
}
