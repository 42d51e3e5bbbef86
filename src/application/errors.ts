/**
 * Application-level errors, mapped to console messages by the CLI error reporter.
 */
export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Invalid username or password');
    this.name = 'InvalidCredentialsError';
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UsernameTakenError extends ConflictError {
  constructor(public readonly username: string) {
    super('Username already exists');
    this.name = 'UsernameTakenError';
  }
}

export class EmailTakenError extends ConflictError {
  constructor(public readonly email: string) {
    super('Email already exists');
    this.name = 'EmailTakenError';
  }
}

/**
 * Storage failures, translated from driver errors at the repository boundary.
 * None of them escapes the menu action that caused it.
 */
export class StorageError extends Error {
  constructor(message = 'Database error occurred', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Connection dropped or unreachable. */
export class StorageConnectivityError extends StorageError {
  constructor(message = 'Database connection error', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageConnectivityError';
  }
}

/** Unique, foreign key, not-null or check violation. */
export class StorageConstraintError extends StorageError {
  constructor(
    message = 'Database constraint error',
    public readonly constraint?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageConstraintError';
  }
}

/** Malformed or out-of-range value rejected by the store. */
export class StorageDataError extends StorageError {
  constructor(message = 'Data error', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageDataError';
  }
}
