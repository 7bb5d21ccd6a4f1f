/**
 * Payload Validation Module
 *
 * Validates registration, profile-update and exercise-update payloads
 * against JSON schemas using ajv. Update schemas reject unknown fields,
 * so only whitelisted columns can ever be named in an UPDATE statement.
 */

import Ajv, { ErrorObject, JSONSchemaType, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { InvalidInputError } from '../models/errors';
import { ExerciseUpdateInput, MAX_RATING } from '../models/exercise';
import {
  AccountUpdateFields,
  NewUserInput,
  PlayerUpdateFields,
  ROLES,
} from '../models/user';

// Initialize ajv with strict mode and format validators
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

// Add format validators (email, etc.)
addFormats(ajv);

const newUserSchema: JSONSchemaType<NewUserInput> = {
  type: 'object',
  properties: {
    username: { type: 'string', minLength: 1 },
    password: { type: 'string', minLength: 1 },
    email: { type: 'string', format: 'email' },
    name: { type: 'string', minLength: 1 },
    birthYear: { type: 'integer', minimum: 1900, maximum: 2100 },
    country: { type: 'string', minLength: 1 },
    role: { type: 'string', enum: [...ROLES] },
    number: { type: 'integer', nullable: true },
    teamId: { type: 'integer', minimum: 1, nullable: true },
  },
  required: ['username', 'password', 'email', 'name', 'birthYear', 'country', 'role'],
  additionalProperties: false,
};

const accountUpdateSchema: JSONSchemaType<AccountUpdateFields> = {
  type: 'object',
  properties: {
    username: { type: 'string', minLength: 1, nullable: true },
    password: { type: 'string', minLength: 1, nullable: true },
    email: { type: 'string', format: 'email', nullable: true },
    name: { type: 'string', minLength: 1, nullable: true },
    picture: { type: 'string', nullable: true },
    birthYear: { type: 'integer', minimum: 1900, maximum: 2100, nullable: true },
    country: { type: 'string', minLength: 1, nullable: true },
  },
  required: [],
  additionalProperties: false,
};

const playerUpdateSchema: JSONSchemaType<PlayerUpdateFields> = {
  type: 'object',
  properties: {
    username: { type: 'string', minLength: 1, nullable: true },
    password: { type: 'string', minLength: 1, nullable: true },
    email: { type: 'string', format: 'email', nullable: true },
    name: { type: 'string', minLength: 1, nullable: true },
    picture: { type: 'string', nullable: true },
    birthYear: { type: 'integer', minimum: 1900, maximum: 2100, nullable: true },
    country: { type: 'string', minLength: 1, nullable: true },
    number: { type: 'integer', nullable: true },
    shirtNumber: { type: 'integer', minimum: 0, nullable: true },
    parentPhone: { type: 'string', nullable: true },
    coachPhone: { type: 'string', nullable: true },
  },
  required: [],
  additionalProperties: false,
};

// Rating 0 stands for "not supplied"
const exerciseUpdateSchema: JSONSchemaType<ExerciseUpdateInput> = {
  type: 'object',
  properties: {
    exercise: { type: 'string', minLength: 1 },
    playerId: { type: 'integer', minimum: 1 },
    result: { type: 'string', nullable: true },
    rating: { type: 'integer', minimum: 0, maximum: MAX_RATING, nullable: true },
  },
  required: ['exercise', 'playerId'],
  additionalProperties: false,
};

// Compile schemas
const validators = {
  newUser: ajv.compile(newUserSchema),
  accountUpdate: ajv.compile(accountUpdateSchema),
  playerUpdate: ajv.compile(playerUpdateSchema),
  exerciseUpdate: ajv.compile(exerciseUpdateSchema),
};

/**
 * Format ajv validation errors into field-specific error details
 */
export function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const field = error.instancePath
      ? error.instancePath.substring(1)
      : String(error.params.missingProperty ?? error.params.additionalProperty ?? 'payload');

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${error.params.missingProperty}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${error.params.type}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${error.params.format}`;
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${error.params.limit}`;
    } else if (error.keyword === 'maximum') {
      message = `Must be <= ${error.params.limit}`;
    } else if (error.keyword === 'minLength') {
      message = `Must be at least ${error.params.limit} characters`;
    } else if (error.keyword === 'enum') {
      message = `Must be one of: ${(error.params.allowedValues ?? []).join(', ')}`;
    } else if (error.keyword === 'additionalProperties') {
      message = `Unknown field: ${error.params.additionalProperty}`;
    }

    details[field] = message;
  }

  return details;
}

function assertValid<T>(validator: ValidateFunction<T>, payload: unknown, message: string): void {
  if (!validator(payload)) {
    throw new InvalidInputError(message, formatValidationErrors(validator.errors ?? []));
  }
}

/**
 * @throws InvalidInputError with field-specific details if validation fails
 */
export function validateNewUser(input: NewUserInput): void {
  assertValid(validators.newUser, input, 'Invalid user registration');
}

export function validatePlayerUpdate(fields: PlayerUpdateFields): void {
  assertValid(validators.playerUpdate, fields, 'Invalid player update');
}

/**
 * Coaches and parents share the account-only field set
 */
export function validateAccountUpdate(fields: AccountUpdateFields): void {
  assertValid(validators.accountUpdate, fields, 'Invalid profile update');
}

export function validateExerciseUpdate(input: ExerciseUpdateInput): void {
  assertValid(validators.exerciseUpdate, input, 'Invalid exercise update');
}
