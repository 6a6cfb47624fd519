import { hash, verify, argon2id } from 'argon2';

/**
 * Password hashing using Argon2id.
 * Each hash carries its own random salt and parameters.
 */
export class Password {
  /**
   * Hash a plain text password.
   */
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, { type: argon2id });
  }

  /**
   * Verify a plain password against a hash in constant time.
   * A stored value that is not an argon2 hash never verifies.
   */
  static async verify(plainPassword: string, hash: string): Promise<boolean> {
    try {
      return await verify(hash, plainPassword);
    } catch {
      return false;
    }
  }
}
