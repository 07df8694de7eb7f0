/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 *
 * NOTE:
 * - bcrypt embeds the salt and cost in the hash, so changing BCRYPT_COST
 *   keeps old hashes verifiable.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

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
      // bcrypt throws on hashes it cannot parse
      return false;
    }
  }
}
