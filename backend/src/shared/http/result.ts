/**
 * backend/src/shared/http/result.ts
 *
 * WHY:
 * - Expected failures (not found, conflict, forbidden, bad input) travel as values,
 *   not exceptions, so every layer shows in its signature what can go wrong.
 * - Only the unit-of-work boundary turns a Result into a status code.
 *
 * RULES:
 * - Throw only for faults nobody anticipated (they become 500s).
 */

import type { AppError } from './errors';

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };

export type Result<T, E = AppError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
