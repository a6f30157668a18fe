/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * bcrypt behind PasswordHasher. Cost comes from BCRYPT_COST (tests run at 4).
 *
 * RULES:
 * - bcrypt reads only the first 72 bytes of its input. Anything after that is ignored,
 *   so the registration schema caps passwords at BCRYPT_MAX_PASSWORD_BYTES.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export const BCRYPT_MAX_PASSWORD_BYTES = 72;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plain, hash);
    } catch {
      // unparseable stored hash: no match
      return false;
    }
  }
}
