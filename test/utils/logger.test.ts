/**
 * Tests for Structured Logging Module
 *
 * Validates structured logging functions, PII sanitization,
 * level filtering and log format consistency.
 */

import { logDatabase, log, LogLevel } from '../../src/utils/logger';

describe('Structured Logging Module', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  const originalLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
  });

  describe('logDatabase', () => {
    it('should log database error with query preview', () => {
      logDatabase({
        errorMessage: 'relation "players" does not exist',
        errorCode: '42P01',
        query: 'SELECT id FROM players WHERE id = $1',
        operation: 'getUser',
      });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);

      expect(logEntry.log_type).toBe('DATABASE_ERROR');
      expect(logEntry.level).toBe('ERROR');
      expect(logEntry.operation).toBe('getUser');
      expect(logEntry.error_code).toBe('42P01');
      expect(logEntry.error_message).toBe('relation "players" does not exist');
      expect(logEntry.query_preview).toBe('SELECT id FROM players WHERE id = $1');
      expect(logEntry.timestamp).toBeDefined();
    });

    it('should truncate long queries to 200 characters', () => {
      const longQuery = 'SELECT ' + 'name, '.repeat(60) + 'id FROM players';

      logDatabase({ errorMessage: 'timeout', query: longQuery, operation: 'getUser' });

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.query_preview).toBe(longQuery.substring(0, 200) + '...');
    });

    it('should redact emails in query and error message', () => {
      logDatabase({
        errorMessage: 'Key (email)=(ana@example.com) already exists.',
        query: "SELECT id FROM players WHERE email = 'ana@example.com'",
        operation: 'getUserByEmail',
      });

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
      expect(logEntry.error_message).toBe('Key (email)=([EMAIL_REDACTED]) already exists.');
      expect(logEntry.query_preview).toBe("SELECT id FROM players WHERE email = '[EMAIL_REDACTED]'");
    });
  });

  describe('log', () => {
    it('should log message with context', () => {
      log(LogLevel.INFO, 'Team created', { operation: 'createTeam', team_id: 3, coach_id: 7 });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);

      expect(logEntry.level).toBe('INFO');
      expect(logEntry.message).toBe('Team created');
      expect(logEntry.operation).toBe('createTeam');
      expect(logEntry.team_id).toBe(3);
      expect(logEntry.coach_id).toBe(7);
    });

    it('should redact account fields in context', () => {
      log(LogLevel.INFO, 'User registered', {
        user_id: 42,
        username: 'ana',
        password: 'test-password',
        email: 'ana@example.com',
        parent_email: 'eva@example.com',
        details: { child_name: 'Ana', note: 'call 555-123-4567' },
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);

      expect(logEntry.user_id).toBe(42);
      expect(logEntry.username).toBe('[PII_REDACTED]');
      expect(logEntry.password).toBe('[PII_REDACTED]');
      expect(logEntry.email).toBe('[PII_REDACTED]');
      expect(logEntry.parent_email).toBe('[PII_REDACTED]');
      expect(logEntry.details).toEqual({
        child_name: '[PII_REDACTED]',
        note: 'call [PHONE_REDACTED]',
      });
    });

    it('should sanitize strings inside arrays', () => {
      log(LogLevel.WARN, 'Lookup', { emails: ['ana@example.com', 'x'] });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.emails).toEqual(['[EMAIL_REDACTED]', 'x']);
    });

    it('should not let context override level or message', () => {
      log(LogLevel.INFO, 'Schema initialized', { level: 'ERROR', message: 'other' });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(logEntry.level).toBe('INFO');
      expect(logEntry.message).toBe('Schema initialized');
    });

    it('should use console.error for ERROR level', () => {
      log(LogLevel.ERROR, 'Database initialization failed');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('level filtering', () => {
    it('should drop INFO entries when LOG_LEVEL is warn', () => {
      process.env.LOG_LEVEL = 'warn';

      log(LogLevel.INFO, 'User registered');
      log(LogLevel.WARN, 'Child already linked');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(consoleLogSpy.mock.calls[0][0]).message).toBe('Child already linked');
    });

    it('should keep only errors when LOG_LEVEL is error', () => {
      process.env.LOG_LEVEL = 'ERROR';

      log(LogLevel.WARN, 'ignored');
      logDatabase({ errorMessage: 'boom', query: 'SELECT 1', operation: 'getUser' });

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });
});
