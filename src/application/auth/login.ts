import { verifyPassword } from '../../domain/auth/password.js';
import type { UserId } from '../../domain/inventory/shoe.js';
import { InvalidCredentialsError } from '../errors.js';
import type { UserStore } from './userStore.js';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  userId: UserId;
  username: string;
}

export class LoginUseCase {
  constructor(private userStore: UserStore) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userStore.findByUsername(command.username);
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const isValid = await verifyPassword(command.password, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    await this.userStore.recordLogin(user.id);

    return {
      userId: user.id,
      username: user.username,
    };
  }
}
