import {
  StorageConnectivityError,
  StorageConstraintError,
  StorageDataError,
  StorageError,
} from '../../application/errors.js';

const SOCKET_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
]);

const CONNECTION_MESSAGES = [
  'Connection terminated',
  'Client was closed',
  'Client has encountered a connection error',
];

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function constraintName(error: Error): string | undefined {
  return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined;
}

/**
 * Collapse a pg driver failure into the storage error taxonomy.
 * SQLSTATE class 08 and socket errors are connectivity, 23 is a
 * constraint violation and 22 is bad data; anything else is a plain
 * StorageError. Already-translated errors pass through.
 */
export function translateDbError(error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new StorageError(String(error), { cause: error });
  }

  const code = errorCode(error);

  if (
    (code && (code.startsWith('08') || code === '57P01' || code === '57P02' || code === '57P03')) ||
    (code && SOCKET_ERROR_CODES.has(code)) ||
    CONNECTION_MESSAGES.some((text) => error.message.includes(text))
  ) {
    return new StorageConnectivityError(error.message, { cause: error });
  }

  if (code?.startsWith('23')) {
    return new StorageConstraintError(error.message, constraintName(error), { cause: error });
  }

  if (code?.startsWith('22')) {
    return new StorageDataError(error.message, { cause: error });
  }

  return new StorageError(error.message, { cause: error });
}
