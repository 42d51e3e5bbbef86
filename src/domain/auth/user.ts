import type { UserId } from '../inventory/shoe.js';

/**
 * Account that owns a shoe collection.
 * Never mutated by inventory operations; deleting it cascades to its shoes.
 */
export interface User {
  readonly id: UserId;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
  readonly lastLogin: Date | null;
}
