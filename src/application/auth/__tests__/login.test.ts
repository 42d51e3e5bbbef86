import { describe, it, expect, beforeEach } from 'vitest';
import { LoginUseCase } from '../login.js';
import { RegisterUseCase } from '../register.js';
import { InvalidCredentialsError } from '../../errors.js';
import { InMemoryUserStore } from '../../../test-utils/inMemoryUserStore.js';

describe('LoginUseCase', () => {
  let users: InMemoryUserStore;
  let useCase: LoginUseCase;

  beforeEach(async () => {
    users = new InMemoryUserStore();
    useCase = new LoginUseCase(users);
    await new RegisterUseCase(users).execute({
      username: 'sam',
      email: 'sam@example.com',
      password: 'test-secret',
    });
  });

  it('should return the user id and stamp the login time', async () => {
    const result = await useCase.execute({ username: 'sam', password: 'test-secret' });

    expect(result).toEqual({ userId: 1, username: 'sam' });
    expect((await users.findByUsername('sam'))?.lastLogin).toBeInstanceOf(Date);
  });

  it('should reject a wrong password', async () => {
    await expect(useCase.execute({ username: 'sam', password: 'wrong' })).rejects.toBeInstanceOf(
      InvalidCredentialsError
    );
    expect((await users.findByUsername('sam'))?.lastLogin).toBeNull();
  });

  it('should reject an unknown username with the same error', async () => {
    await expect(useCase.execute({ username: 'nobody', password: 'test-secret' })).rejects.toThrow(
      'Invalid username or password'
    );
  });
});
