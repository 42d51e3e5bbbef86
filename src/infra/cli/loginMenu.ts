import type { LoginUseCase } from '../../application/auth/login.js';
import type { RegisterUseCase } from '../../application/auth/register.js';
import { InvalidCredentialsError } from '../../application/errors.js';
import { parseEmail, parsePassword, parseUsername } from '../../domain/inventory/fields.js';
import type { UserId } from '../../domain/inventory/shoe.js';
import { describeError, type FailedAction } from './errorReporter.js';
import { INVALID_CHOICE } from './menuState.js';
import { promptUntilValid } from './prompt.js';
import type { Terminal } from './terminal.js';

export const LOGIN_MENU_LINES = [
  'Welcome to the Shoe Database',
  'Are you a new user or an existing user?',
  '1. New user',
  '2. Existing user',
  '3. Exit',
];

const CREATE_ACCOUNT: FailedAction = { subject: 'account', verb: 'create', pastTense: 'created' };
const LOG_IN: FailedAction = { subject: 'account', verb: 'log in to', pastTense: 'logged in' };

/**
 * The LoggedOut state: register or log in, yielding the owner id the
 * inventory menu is scoped to. Null means the user left.
 */
export class LoginMenu {
  constructor(
    private terminal: Terminal,
    private register: RegisterUseCase,
    private login: LoginUseCase
  ) {}

  async run(): Promise<UserId | null> {
    for (;;) {
      LOGIN_MENU_LINES.forEach((line) => this.terminal.print(line));
      const choice = await this.terminal.ask('Enter your choice: ');

      switch (choice?.trim()) {
        case undefined:
          return null;
        case '1':
          return this.createAccount();
        case '2':
          this.terminal.print('Existing user, redirecting to login');
          return this.logIn();
        case '3':
          this.terminal.print('Exiting Shoe Database...');
          return null;
        default:
          this.terminal.print();
          this.terminal.print(INVALID_CHOICE);
          this.terminal.print();
      }
    }
  }

  private async createAccount(): Promise<UserId | null> {
    this.terminal.print('New user, you will need to create an account');

    try {
      let username = await promptUntilValid(this.terminal, 'Enter your username: ', parseUsername);
      while (username !== null && (await this.register.isUsernameTaken(username))) {
        this.terminal.print('Username already exists, please choose a different username');
        username = await promptUntilValid(this.terminal, 'Enter your username: ', parseUsername);
      }
      if (username === null) {
        return null;
      }

      let email = await promptUntilValid(this.terminal, 'Enter your email: ', parseEmail);
      while (email !== null && (await this.register.isEmailTaken(email))) {
        this.terminal.print('Email already exists, please choose a different email');
        email = await promptUntilValid(this.terminal, 'Enter your email: ', parseEmail);
      }
      if (email === null) {
        return null;
      }

      const password = await promptUntilValid(this.terminal, 'Enter your password: ', parsePassword, {
        secret: true,
      });
      if (password === null) {
        return null;
      }

      await this.register.execute({ username, email, password });
      this.terminal.print('User created successfully, redirecting to login...');
    } catch (error) {
      describeError(error, CREATE_ACCOUNT).forEach((line) => this.terminal.error(line));
      return null;
    }

    return this.logIn();
  }

  /**
   * Asks until the credentials match; storage failures are reported and
   * the prompt repeats.
   */
  private async logIn(): Promise<UserId | null> {
    for (;;) {
      const username = await this.terminal.ask('Enter your username: ');
      if (username === null) {
        return null;
      }
      const password = await this.terminal.askSecret('Enter your password: ');
      if (password === null) {
        return null;
      }

      try {
        const result = await this.login.execute({ username: username.trim(), password });
        this.terminal.print('Login successful, heading to main menu...');
        return result.userId;
      } catch (error) {
        if (error instanceof InvalidCredentialsError) {
          this.terminal.print('Invalid username or password, please try again');
        } else {
          describeError(error, LOG_IN).forEach((line) => this.terminal.error(line));
          this.terminal.print('Unable to login. Please try again.');
        }
      }
    }
  }
}
