/**
 * Application Error Models
 *
 * Error kinds raised by the data-access layer. Callers (an API or CLI
 * layer) map these onto their own status codes.
 */

/**
 * Bad role, missing required field or malformed payload.
 * `details` maps a field name to what was wrong with it.
 */
export class InvalidInputError extends Error {
  constructor(message: string, public details?: Record<string, string>) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Referenced team, coach, parent, child, player or exercise is absent
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Duplicate team name, or a coach who already owns a team
 */
export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

/**
 * Unique constraint rejected the write (duplicate username or email)
 */
export class UniquenessViolationError extends Error {
  constructor(message: string, public constraint?: string) {
    super(message);
    this.name = 'UniquenessViolationError';
  }
}

/**
 * A required foreign reference is missing (e.g. a team without its coach row)
 */
export class InconsistentStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InconsistentStateError';
  }
}

/**
 * Database error class for connection and query errors
 */
export class DatabaseError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'DatabaseError';
  }
}
