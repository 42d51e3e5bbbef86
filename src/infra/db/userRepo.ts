import type { NewUser, UserStore } from '../../application/auth/userStore.js';
import {
  EmailTakenError,
  StorageConstraintError,
  UsernameTakenError,
} from '../../application/errors.js';
import type { User } from '../../domain/auth/user.js';
import type { UserId } from '../../domain/inventory/shoe.js';
import type { Database } from './database.js';

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
  last_login: Date | null;
}

const USER_COLUMNS = 'id, username, email, password_hash, created_at, last_login';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    lastLogin: row.last_login,
  };
}

export class UserRepo implements UserStore {
  constructor(private db: Database) {}

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async create(user: NewUser): Promise<User> {
    try {
      return await this.db.transaction(async (tx) => {
        const result = await tx.query<UserRow>(
          `INSERT INTO users (username, email, password_hash)
           VALUES ($1, $2, $3)
           RETURNING ${USER_COLUMNS}`,
          [user.username, user.email, user.passwordHash]
        );
        return toUser(result.rows[0]);
      });
    } catch (error) {
      if (error instanceof StorageConstraintError) {
        if (error.constraint === 'users_username_key') {
          throw new UsernameTakenError(user.username);
        }
        if (error.constraint === 'users_email_key') {
          throw new EmailTakenError(user.email);
        }
      }
      throw error;
    }
  }

  async recordLogin(id: UserId): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.query('UPDATE users SET last_login = NOW() WHERE id = $1', [id]);
    });
  }

  /**
   * Shoes owned by the user go with it (ON DELETE CASCADE).
   */
  async delete(id: UserId): Promise<number> {
    return this.db.transaction(async (tx) => {
      const result = await tx.query('DELETE FROM users WHERE id = $1', [id]);
      return result.rowCount ?? 0;
    });
  }
}
