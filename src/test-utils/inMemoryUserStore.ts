import type { NewUser, UserStore } from '../application/auth/userStore.js';
import { EmailTakenError, UsernameTakenError } from '../application/errors.js';
import type { User } from '../domain/auth/user.js';
import type { UserId } from '../domain/inventory/shoe.js';

export class InMemoryUserStore implements UserStore {
  private users: User[] = [];
  private nextId = 1;

  async findByUsername(username: string): Promise<User | null> {
    return this.users.find((user) => user.username === username) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.users.find((user) => user.email === email) ?? null;
  }

  async create(user: NewUser): Promise<User> {
    if (this.users.some((existing) => existing.username === user.username)) {
      throw new UsernameTakenError(user.username);
    }
    if (this.users.some((existing) => existing.email === user.email)) {
      throw new EmailTakenError(user.email);
    }
    const created: User = {
      id: this.nextId++,
      ...user,
      createdAt: new Date(),
      lastLogin: null,
    };
    this.users.push(created);
    return created;
  }

  async recordLogin(id: UserId): Promise<void> {
    this.users = this.users.map((user) => (user.id === id ? { ...user, lastLogin: new Date() } : user));
  }

  async delete(id: UserId): Promise<number> {
    const before = this.users.length;
    this.users = this.users.filter((user) => user.id !== id);
    return before - this.users.length;
  }
}
