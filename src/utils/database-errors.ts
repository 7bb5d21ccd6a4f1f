/**
 * Database Error Translation
 *
 * Maps PostgreSQL driver failures onto the application error kinds.
 * Application errors raised inside a transaction pass through untouched.
 */

import {
  ConflictError,
  DatabaseError,
  InconsistentStateError,
  InvalidInputError,
  NotFoundError,
  UniquenessViolationError,
} from '../models/errors';
import { logDatabase } from './logger';

/**
 * SQLSTATE codes the data-access layer reacts to
 */
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  CHECK_VIOLATION: '23514',
  NOT_NULL_VIOLATION: '23502',
} as const;

/**
 * Shape of an error raised by the pg driver for a failed statement
 */
export interface PgErrorLike extends Error {
  code: string;
  constraint?: string;
}

/**
 * Check whether `error` carries a five-character SQLSTATE code
 */
export function isPgError(error: unknown): error is PgErrorLike {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    /^[0-9A-Z]{5}$/.test(error.code)
  );
}

/**
 * Check if error is a database connection error
 *
 * Detects common database connection error patterns:
 * - ECONNREFUSED: Connection refused
 * - ETIMEDOUT: Connection timeout
 * - ENOTFOUND: Host not found
 * - Connection terminated unexpectedly
 */
export function isDatabaseConnectionError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('connection terminated') ||
    message.includes('connection refused') ||
    message.includes('connect timeout') ||
    error.name === 'DatabaseError'
  );
}

/**
 * Errors the data-access layer raises itself. Their messages can carry
 * caller input, so they are never inspected for connection failures.
 */
function isApplicationError(error: Error): boolean {
  return (
    error instanceof InvalidInputError ||
    error instanceof NotFoundError ||
    error instanceof ConflictError ||
    error instanceof UniquenessViolationError ||
    error instanceof InconsistentStateError ||
    error instanceof DatabaseError
  );
}

function describeUniqueViolation(constraint: string | undefined): string {
  if (constraint?.endsWith('_email_key')) {
    return 'Email already exists';
  }
  if (constraint?.endsWith('_username_key')) {
    return 'Username already exists';
  }
  if (constraint === 'teams_name_key') {
    return 'Team name already exists';
  }
  return 'Duplicate value violates a unique constraint';
}

/**
 * Translate a failure caught at a transaction boundary
 *
 * @param error - Whatever the transaction callback or driver threw
 * @param operation - Public operation name, recorded in the log entry
 * @returns The error to rethrow to the caller
 */
export function translateDatabaseError(error: unknown, operation: string): Error {
  if (isPgError(error)) {
    switch (error.code) {
      case PG_ERROR_CODES.UNIQUE_VIOLATION:
        return new UniquenessViolationError(
          describeUniqueViolation(error.constraint),
          error.constraint
        );
      case PG_ERROR_CODES.FOREIGN_KEY_VIOLATION:
        return new NotFoundError(
          `Referenced record not found${error.constraint ? ` (${error.constraint})` : ''}`
        );
      case PG_ERROR_CODES.CHECK_VIOLATION:
        return new InvalidInputError(
          `Value rejected by check constraint${error.constraint ? ` ${error.constraint}` : ''}`
        );
      case PG_ERROR_CODES.NOT_NULL_VIOLATION:
        return new InvalidInputError('A required field cannot be null');
      default:
        logDatabase({
          errorMessage: error.message,
          errorCode: error.code,
          query: operation,
          operation,
        });
        return new DatabaseError(`Database operation failed: ${operation}`, error);
    }
  }

  if (error instanceof Error) {
    if (!isApplicationError(error) && isDatabaseConnectionError(error)) {
      logDatabase({
        errorMessage: error.message,
        query: operation,
        operation,
      });
      return new DatabaseError('Database connection failed', error);
    }
    return error;
  }

  return new Error(String(error));
}
