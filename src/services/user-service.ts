/**
 * User Service
 *
 * Business logic layer for account registration, lookup, profile updates
 * and player deletion.
 */

import { transaction } from '../config/database';
import { InvalidInputError } from '../models/errors';
import {
  COACH_UPDATE_COLUMNS,
  ColumnAssignment,
  NewUserInput,
  PARENT_UPDATE_COLUMNS,
  PLAYER_UPDATE_COLUMNS,
  ROLES,
  Role,
  UserRecord,
  UserUpdate,
  isRole,
  toColumnAssignments,
} from '../models/user';
import { ExerciseRepository } from '../repositories/exercise-repository';
import { UserRepository } from '../repositories/user-repository';
import { LogLevel, log } from '../utils/logger';
import {
  validateAccountUpdate,
  validateNewUser,
  validatePlayerUpdate,
} from '../utils/validation';

/**
 * User Service
 * Provides business logic for player, coach and parent accounts
 */
export class UserService {
  constructor(
    private userRepository: UserRepository,
    private exerciseRepository: ExerciseRepository
  ) {}

  /**
   * Register an account in the table of its role
   *
   * A new player also gets one empty result row per existing exercise,
   * written in the same transaction.
   *
   * @returns Identifier of the new account
   * @throws InvalidInputError for an unknown role or malformed payload
   * @throws UniquenessViolationError when the username or email is taken
   */
  async addUser(input: NewUserInput): Promise<number> {
    if (!isRole(input.role)) {
      throw new InvalidInputError('Invalid role provided');
    }
    validateNewUser(input);

    return transaction('addUser', async (client) => {
      switch (input.role) {
        case 'player': {
          const userId = await this.userRepository.insertPlayer(client, input);
          const exerciseRows = await this.exerciseRepository.createForPlayer(client, userId);
          log(LogLevel.INFO, 'User registered', {
            operation: 'addUser',
            user_id: userId,
            role: input.role,
            exercise_rows: exerciseRows,
          });
          return userId;
        }
        case 'coach': {
          const userId = await this.userRepository.insertCoach(client, input);
          log(LogLevel.INFO, 'User registered', { operation: 'addUser', user_id: userId, role: input.role });
          return userId;
        }
        case 'parent': {
          const userId = await this.userRepository.insertParent(client, input);
          log(LogLevel.INFO, 'User registered', { operation: 'addUser', user_id: userId, role: input.role });
          return userId;
        }
      }
    });
  }

  /**
   * Get an account by id within one role's table
   *
   * @throws InvalidInputError for an unknown role
   */
  async getUser(id: number, role: Role): Promise<UserRecord | null> {
    if (!isRole(role)) {
      throw new InvalidInputError('Invalid role provided');
    }
    return transaction('getUser', (client) => this.userRepository.findById(client, role, id));
  }

  /**
   * Find an account by email, probing players, then coaches, then parents
   *
   * @returns The first match tagged with its role, or null
   */
  async getUserByEmail(email: string): Promise<UserRecord | null> {
    return transaction('getUserByEmail', async (client) => {
      for (const role of ROLES) {
        const user = await this.userRepository.findByEmail(client, role, email);
        if (user) {
          return user;
        }
      }
      return null;
    });
  }

  /**
   * Update profile fields of one account
   *
   * Fields are validated against the role's whitelist before any SQL is
   * built. An update with no fields is a no-op.
   *
   * @throws InvalidInputError for an unknown role or field
   * @throws UniquenessViolationError when a new username or email is taken
   */
  async updateUser(update: UserUpdate): Promise<void> {
    const assignments = this.collectAssignments(update);
    if (assignments.length === 0) {
      return;
    }

    await transaction('updateUser', (client) =>
      this.userRepository.update(client, update.role, update.id, assignments)
    );
  }

  /**
   * Delete a player; their exercise rows and parent links cascade
   *
   * @returns True when a player row was removed
   */
  async deleteUser(id: number): Promise<boolean> {
    const deleted = await transaction('deleteUser', (client) =>
      this.userRepository.deletePlayer(client, id)
    );
    if (deleted > 0) {
      log(LogLevel.INFO, 'Player deleted', { operation: 'deleteUser', user_id: id });
    }
    return deleted > 0;
  }

  private collectAssignments(update: UserUpdate): ColumnAssignment[] {
    if (!isRole(update.role)) {
      throw new InvalidInputError('Invalid role provided');
    }

    switch (update.role) {
      case 'player':
        validatePlayerUpdate(update.fields);
        return toColumnAssignments(update.fields, PLAYER_UPDATE_COLUMNS);
      case 'coach':
        validateAccountUpdate(update.fields);
        return toColumnAssignments(update.fields, COACH_UPDATE_COLUMNS);
      case 'parent':
        validateAccountUpdate(update.fields);
        return toColumnAssignments(update.fields, PARENT_UPDATE_COLUMNS);
    }
  }
}
