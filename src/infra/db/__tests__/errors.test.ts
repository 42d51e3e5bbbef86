import { describe, it, expect } from 'vitest';
import { translateDbError } from '../errors.js';
import {
  StorageConnectivityError,
  StorageConstraintError,
  StorageDataError,
  StorageError,
} from '../../../application/errors.js';

function pgError(message: string, fields: Record<string, string>): Error {
  return Object.assign(new Error(message), fields);
}

describe('translateDbError', () => {
  it.each(['08006', '08001', '57P01', 'ECONNREFUSED', 'ETIMEDOUT'])(
    'should treat code %s as a connectivity failure',
    (code) => {
      const translated = translateDbError(pgError('lost', { code }));

      expect(translated).toBeInstanceOf(StorageConnectivityError);
      expect(translated.message).toBe('lost');
    }
  );

  it('should recognise a terminated connection by its message', () => {
    expect(translateDbError(new Error('Connection terminated unexpectedly'))).toBeInstanceOf(
      StorageConnectivityError
    );
  });

  it('should keep the violated constraint name', () => {
    const translated = translateDbError(
      pgError('duplicate key value violates unique constraint "users_email_key"', {
        code: '23505',
        constraint: 'users_email_key',
      })
    );

    expect(translated).toBeInstanceOf(StorageConstraintError);
    expect(translated instanceof StorageConstraintError && translated.constraint).toBe(
      'users_email_key'
    );
  });

  it('should map class 22 to a data error', () => {
    const cause = pgError('value too long for type character varying(100)', { code: '22001' });
    const translated = translateDbError(cause);

    expect(translated).toBeInstanceOf(StorageDataError);
    expect(translated.cause).toBe(cause);
  });

  it('should fall back to a plain storage error', () => {
    const translated = translateDbError(pgError('relation "shoes" does not exist', { code: '42P01' }));

    expect(translated.constructor).toBe(StorageError);
    expect(translated.message).toBe('relation "shoes" does not exist');
  });

  it('should pass translated errors through and wrap non-errors', () => {
    const already = new StorageDataError('bad');

    expect(translateDbError(already)).toBe(already);
    expect(translateDbError('boom').message).toBe('boom');
  });
});
