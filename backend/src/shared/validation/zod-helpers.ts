/**
 * backend/src/shared/validation/zod-helpers.ts
 *
 * WHY:
 * - Every module validates input the same way and reports violations the same way.
 *
 * RULES:
 * - Validation failures are BAD_REQUEST values, never thrown.
 * - The message lists each violation as `path: message`, joined with "; ".
 */

import { z } from 'zod';
import { AppError } from '../http/errors';
import { err, ok, type Result } from '../http/result';

// Upper bound of a Postgres `integer` column.
export const PG_INT_MAX = 2_147_483_647;

const WHOLE_NUMBER = 'Expected a whole number';

// JSON numbers and digit-only strings; `Number()` coercion alone would take true, [5] or " 7 ".
const wholeNumberInput = z.union([z.number(), z.string().regex(/^\d+$/, WHOLE_NUMBER)], {
  errorMap: () => ({ message: WHOLE_NUMBER }),
});

export function intInRange(min: number, max: number) {
  return wholeNumberInput.pipe(z.coerce.number().int().min(min).max(max));
}

export const entityIdSchema = intInRange(1, PG_INT_MAX);

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err(
      AppError.badRequest(formatIssues(parsed.error), {
        issues: parsed.error.issues.map((i) => ({ path: i.path, code: i.code })),
      }),
    );
  }
  return ok(parsed.data);
}
