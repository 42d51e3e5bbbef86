import {
  ConflictError,
  StorageConnectivityError,
  StorageConstraintError,
  StorageDataError,
  StorageError,
  UnauthorizedError,
} from '../../application/errors.js';

export interface FailedAction {
  subject: 'shoe' | 'account';
  verb: string;
  pastTense: string;
}

/**
 * Console lines for an error raised by one menu action,
 * e.g. { subject: 'shoe', verb: 'add', pastTense: 'added' }.
 */
export function describeError(error: unknown, action: FailedAction): string[] {
  if (error instanceof StorageConstraintError) {
    return [
      `❌ Database constraint error: Unable to ${action.verb} ${action.subject}`,
      'Please check your data and try again',
    ];
  }

  if (error instanceof StorageDataError) {
    return [`❌ Data error: ${error.message}`, 'Please check your input values'];
  }

  if (error instanceof StorageConnectivityError) {
    return ['❌ Database connection error', 'Please try again'];
  }

  if (error instanceof StorageError) {
    return ['❌ Database error occurred', `The ${action.subject} was not ${action.pastTense}`];
  }

  if (error instanceof ConflictError || error instanceof UnauthorizedError) {
    return [`❌ ${error.message}`];
  }

  if (error instanceof Error) {
    return [`❌ Unexpected error: ${error.message}`];
  }

  return [`❌ Unexpected error: ${String(error)}`];
}
