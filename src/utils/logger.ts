/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the data-access layer. Every entry carries a timestamp and level; context
 * objects are sanitized so account credentials and contact details of
 * players, coaches and parents never reach the log stream.
 */

import { loadEnvironmentConfig } from '../config/environment';

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.INFO]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.ERROR]: 2,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  operation?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  error_code?: string;
  query_preview: string;
}

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'username',
  'password',
  'name',
  'email',
  'phone',
  'phone_number',
  'number',
  'birth_year',
  'birthyear',
  'picture',
  'parent_name',
  'parent_email',
  'parent_phone',
  'coach_name',
  'coach_email',
  'coach_phone',
  'child_name',
  'child_email',
  'child_username',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value && typeof value === 'object') {
    return sanitizeObject(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

function resolveThreshold(): LogLevel {
  switch (loadEnvironmentConfig().logLevel.toLowerCase()) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Write log entry to console, dropping entries below LOG_LEVEL
 */
function writeLog(entry: BaseLogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[resolveThreshold()]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log database error
 *
 * Logs a failed statement with a sanitized, truncated query preview.
 * Bound parameters are never logged.
 *
 * @example
 * ```typescript
 * logDatabase({
 *   errorMessage: 'duplicate key value violates unique constraint',
 *   errorCode: '23505',
 *   query: 'INSERT INTO players (username, ...) VALUES ($1, ...)',
 *   operation: 'addUser'
 * });
 * ```
 */
export function logDatabase(params: {
  errorMessage: string;
  errorCode?: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query);

  // Truncate query for logging (first 200 characters)
  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    operation: params.operation,
    error_message: sanitizeString(params.errorMessage),
    error_code: params.errorCode,
    query_preview: queryPreview,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * General-purpose logging function for custom log entries.
 * Automatically sanitizes context to remove PII.
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'User registered', {
 *   operation: 'addUser',
 *   user_id: 42,
 *   role: 'player',
 *   exercise_rows: 17
 * });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    ...sanitizedContext,
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  writeLog(entry);
}
