/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 */

import Fastify from 'fastify';

import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request', { flow: 'http' });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('response', {
      flow: 'http',
      status: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  return app;
}
