import { hash, verify } from 'argon2';

/**
 * Argon2 hash of a plain-text password, as stored in users.password_hash.
 */
export async function hashPassword(plainPassword: string): Promise<string> {
  return await hash(plainPassword);
}

/**
 * A stored hash argon2 cannot parse counts as a mismatch.
 */
export async function verifyPassword(plainPassword: string, passwordHash: string): Promise<boolean> {
  try {
    return await verify(passwordHash, plainPassword);
  } catch {
    return false;
  }
}
