/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 * - DATABASE_URL wins when present; otherwise the URL is assembled from POSTGRES_*.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() turns the string "false" into true, so flags are parsed explicitly.
const FlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  DATABASE_URL: z.string().min(1).optional(),
  POSTGRES_HOST: z.string().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5431),
  POSTGRES_USER: z.string().min(1).default('app'),
  POSTGRES_PASSWORD: z.string().default('secret'),
  POSTGRES_DB: z.string().min(1).default('app'),
  DB_LOG_QUERIES: FlagSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('adboard-backend'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  databaseUrl: string;
  logQueries: boolean;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;
};

type ParsedEnv = z.infer<typeof ConfigSchema>;

function buildDatabaseUrl(parsed: ParsedEnv): string {
  if (parsed.DATABASE_URL) return parsed.DATABASE_URL;

  const user = encodeURIComponent(parsed.POSTGRES_USER);
  const password = encodeURIComponent(parsed.POSTGRES_PASSWORD);
  return `postgresql://${user}:${password}@${parsed.POSTGRES_HOST}:${parsed.POSTGRES_PORT}/${parsed.POSTGRES_DB}`;
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    databaseUrl: buildDatabaseUrl(parsed),
    logQueries: parsed.DB_LOG_QUERIES,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,
  };
}
