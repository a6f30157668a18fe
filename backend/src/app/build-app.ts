/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> schema -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { ensureSchema } from '../shared/db/ensure-schema';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);

  try {
    await ensureSchema(deps.db);
  } catch (error: unknown) {
    await deps.close();
    throw error;
  }

  const app = await buildServer();
  registerRoutes(app, { config, deps });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
