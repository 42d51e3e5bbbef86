import { hashPassword } from '../../domain/auth/password.js';
import type { UserId } from '../../domain/inventory/shoe.js';
import { EmailTakenError, UsernameTakenError } from '../errors.js';
import type { UserStore } from './userStore.js';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
}

export interface RegisterResult {
  userId: UserId;
  username: string;
  email: string;
}

export class RegisterUseCase {
  constructor(private userStore: UserStore) {}

  async isUsernameTaken(username: string): Promise<boolean> {
    return (await this.userStore.findByUsername(username)) !== null;
  }

  async isEmailTaken(email: string): Promise<boolean> {
    return (await this.userStore.findByEmail(email)) !== null;
  }

  async execute(command: RegisterCommand): Promise<RegisterResult> {
    if (await this.isUsernameTaken(command.username)) {
      throw new UsernameTakenError(command.username);
    }
    if (await this.isEmailTaken(command.email)) {
      throw new EmailTakenError(command.email);
    }

    const passwordHash = await hashPassword(command.password);

    // A concurrent registration can still win the race; the store
    // reports that as the same taken errors.
    const user = await this.userStore.create({
      username: command.username,
      email: command.email,
      passwordHash,
    });

    return {
      userId: user.id,
      username: user.username,
      email: user.email,
    };
  }
}
