/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = number;

export type User = {
  id: UserId;
  mail: string;
  passwordHash: string;
};

export type NewUser = {
  mail: string;
  passwordHash: string;
};
