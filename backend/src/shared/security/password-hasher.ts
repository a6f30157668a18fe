/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - User registration stores a hash, never the submitted password.
 * - UserService depends on this interface; tests swap in a hasher that fails.
 *
 * CONTRACT:
 * - hash() is salted: registering the same password twice stores two different hashes.
 * - verify() resolves to false on mismatch or on a stored value that is not a hash.
 * - Inputs longer than the implementation can distinguish must be refused upstream
 *   (see user.schemas.ts); verify() of two such inputs is not defined to differ.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
