/**
 * backend/src/shared/logger/logger.ts
 *
 * Process-wide winston logger for the adboard backend: one JSON line per event,
 * tagged with `service` and `env`.
 *
 * - Event names are dotted (`users.register.success`, `uow.rollback`, `server.listening`).
 * - Inside a request, log through `withRequestContext(req)` so the requestId is attached.
 * - Pass errors as `{ err }`; the errors format keeps the stack.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'adboard-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
