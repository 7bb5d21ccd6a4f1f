/**
 * Database Error Translation Tests
 */

import {
  isDatabaseConnectionError,
  isPgError,
  translateDatabaseError,
} from '../../src/utils/database-errors';
import {
  ConflictError,
  DatabaseError,
  InvalidInputError,
  NotFoundError,
  UniquenessViolationError,
} from '../../src/models/errors';

function pgError(code: string, constraint?: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code, constraint });
}

describe('Database Error Translation', () => {
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe('isPgError', () => {
    it('should recognise errors carrying a SQLSTATE code', () => {
      expect(isPgError(pgError('23505'))).toBe(true);
      expect(isPgError(pgError('42P01'))).toBe(true);
    });

    it('should reject system errors and plain values', () => {
      expect(isPgError(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBe(false);
      expect(isPgError(new Error('plain'))).toBe(false);
      expect(isPgError({ code: '23505' })).toBe(false);
      expect(isPgError(null)).toBe(false);
    });
  });

  describe('isDatabaseConnectionError', () => {
    it.each([
      'connect ECONNREFUSED 127.0.0.1:5432',
      'Connection terminated unexpectedly',
      'getaddrinfo ENOTFOUND db.local',
      'connect ETIMEDOUT',
    ])('should detect "%s"', (message) => {
      expect(isDatabaseConnectionError(new Error(message))).toBe(true);
    });

    it('should ignore application errors', () => {
      expect(isDatabaseConnectionError(new NotFoundError('Team not found'))).toBe(false);
    });
  });

  describe('translateDatabaseError', () => {
    it('should map duplicate email to UniquenessViolationError', () => {
      const error = translateDatabaseError(pgError('23505', 'coaches_email_key'), 'addUser');

      expect(error).toBeInstanceOf(UniquenessViolationError);
      expect(error.message).toBe('Email already exists');
      expect(error).toMatchObject({ constraint: 'coaches_email_key' });
    });

    it('should map duplicate username to UniquenessViolationError', () => {
      const error = translateDatabaseError(pgError('23505', 'parents_username_key'), 'addUser');

      expect(error).toBeInstanceOf(UniquenessViolationError);
      expect(error.message).toBe('Username already exists');
    });

    it('should map duplicate team name', () => {
      const error = translateDatabaseError(pgError('23505', 'teams_name_key'), 'createTeam');

      expect(error.message).toBe('Team name already exists');
    });

    it('should map foreign key violations to NotFoundError', () => {
      const error = translateDatabaseError(pgError('23503', 'teams_coach_id_fkey'), 'createTeam');

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe('Referenced record not found (teams_coach_id_fkey)');
    });

    it('should map check violations to InvalidInputError', () => {
      const error = translateDatabaseError(
        pgError('23514', 'player_exercises_rating_check'),
        'updateExercise'
      );

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error.message).toBe('Value rejected by check constraint player_exercises_rating_check');
    });

    it('should map not-null violations to InvalidInputError', () => {
      const error = translateDatabaseError(pgError('23502'), 'updateUser');

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error.message).toBe('A required field cannot be null');
    });

    it('should wrap other driver errors in DatabaseError and log them', () => {
      const original = pgError('42P01');
      const error = translateDatabaseError(original, 'getUser');

      expect(error).toBeInstanceOf(DatabaseError);
      expect(error.message).toBe('Database operation failed: getUser');
      expect(error).toMatchObject({ originalError: original });
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(consoleErrorSpy.mock.calls[0][0])).toMatchObject({
        log_type: 'DATABASE_ERROR',
        error_code: '42P01',
        operation: 'getUser',
      });
    });

    it('should pass application errors through unchanged', () => {
      const conflict = new ConflictError('Coach already has a team');

      expect(translateDatabaseError(conflict, 'createTeam')).toBe(conflict);
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should keep application errors whose message looks like a connection failure', () => {
      const notFound = new NotFoundError("Exercise 'Connection refused drill' not found");

      const error = translateDatabaseError(notFound, 'updateExercise');

      expect(error).toBe(notFound);
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should keep an already translated DatabaseError', () => {
      const wrapped = new DatabaseError('Database connection failed');

      expect(translateDatabaseError(wrapped, 'getUser')).toBe(wrapped);
    });

    it('should wrap non-Error values', () => {
      const error = translateDatabaseError('boom', 'linkChild');

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('boom');
    });
  });
});
