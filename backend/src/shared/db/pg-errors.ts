/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Drivers (pg, in-process Postgres in tests) surface SQLSTATE on `err.code`.
 * - Only this file knows what a unique violation looks like on the wire.
 */

export const PG_UNIQUE_VIOLATION = '23505';

export type UniqueViolation = {
  constraint: string | null;
  detail: string | null;
};

export function asUniqueViolation(error: unknown): UniqueViolation | null {
  if (typeof error !== 'object' || error === null) return null;
  if (!('code' in error) || error.code !== PG_UNIQUE_VIOLATION) return null;

  const constraint =
    'constraint' in error && typeof error.constraint === 'string' ? error.constraint : null;
  const detail = 'detail' in error && typeof error.detail === 'string' ? error.detail : null;

  return { constraint, detail };
}
