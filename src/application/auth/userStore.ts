import type { User } from '../../domain/auth/user.js';
import type { UserId } from '../../domain/inventory/shoe.js';

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
}

/**
 * Persistence port for accounts. `create` throws UsernameTakenError or
 * EmailTakenError when a unique key is already in use.
 */
export interface UserStore {
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  recordLogin(id: UserId): Promise<void>;
  delete(id: UserId): Promise<number>;
}
