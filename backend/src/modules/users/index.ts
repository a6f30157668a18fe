/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { getUserById } from './queries/user.queries';
export type { UserRepo, DeletedAck } from './dal/user.repo';
export type { User, UserId } from './user.types';
