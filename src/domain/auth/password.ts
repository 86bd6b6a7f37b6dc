import { argon2id, hash, needsRehash, verify } from 'argon2';

export const PASSWORD_MIN_LENGTH = 8;

const HASH_OPTIONS = {
  type: argon2id,
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
} as const;

/**
 * Argon2id password hashing.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return hash(plainPassword, HASH_OPTIONS);
  }

  /**
   * A malformed stored hash counts as a mismatch.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch (error) {
      console.warn('Password verification failed on stored hash:', error);
      return false;
    }
  }

  static needsRehash(passwordHash: string): boolean {
    return needsRehash(passwordHash, HASH_OPTIONS);
  }
}
