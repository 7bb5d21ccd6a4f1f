/**
 * Exercise Service
 *
 * Business logic layer for a player's exercise progress sheet and for
 * recording results and ratings.
 */

import { transaction } from '../config/database';
import { InvalidInputError, NotFoundError } from '../models/errors';
import {
  ExerciseUpdateInput,
  ExerciseUpdateOutcome,
  ProgressSheet,
  RESULT_PLACEHOLDER,
  groupProgressRows,
} from '../models/exercise';
import { ColumnAssignment } from '../models/user';
import { ExerciseRepository } from '../repositories/exercise-repository';
import { validateExerciseUpdate } from '../utils/validation';

export const EXERCISE_UPDATED_MESSAGE = 'Exercise updated successfully.';
export const NO_MATCHING_EXERCISE_ERROR = 'No matching exercise found for this player.';

/**
 * Exercise Service
 * Provides business logic for exercise results and ratings
 */
export class ExerciseService {
  constructor(private exerciseRepository: ExerciseRepository) {}

  /**
   * Get every category with its exercises and the player's result/rating
   *
   * @returns Category name -> exercises, in seeded category order
   */
  async getCategoriesAndExercisesWithRatings(playerId: number): Promise<ProgressSheet> {
    const rows = await transaction('getCategoriesAndExercisesWithRatings', (client) =>
      this.exerciseRepository.findProgressByPlayer(client, playerId)
    );
    return groupProgressRows(rows);
  }

  /**
   * Record a result and/or rating for one of a player's exercises
   *
   * Only the supplied fields are written: a result of "N/A" and a rating
   * of 0 count as not supplied.
   *
   * @returns Success, or a no-match outcome when the player has no row
   *   for the exercise
   * @throws InvalidInputError if the exercise name is missing or neither
   *   field is supplied
   * @throws NotFoundError if the exercise doesn't exist
   */
  async updateExercise(input: ExerciseUpdateInput): Promise<ExerciseUpdateOutcome> {
    if (!input.exercise) {
      throw new InvalidInputError('Exercise name is required');
    }

    const hasResult = input.result !== undefined && input.result !== null && input.result !== RESULT_PLACEHOLDER;
    const hasRating = input.rating !== undefined && input.rating !== null && input.rating !== 0;

    if (!hasResult && !hasRating) {
      throw new InvalidInputError("At least one of 'result' or 'rating' must be provided and valid");
    }
    validateExerciseUpdate(input);

    const assignments: ColumnAssignment[] = [];
    if (hasResult) {
      assignments.push({ column: 'result', value: input.result });
    }
    if (hasRating) {
      assignments.push({ column: 'rating', value: input.rating });
    }

    const updated = await transaction('updateExercise', async (client) => {
      const exerciseId = await this.exerciseRepository.findIdByName(client, input.exercise);
      if (exerciseId === null) {
        throw new NotFoundError(`Exercise '${input.exercise}' not found`);
      }
      return this.exerciseRepository.updateForPlayer(client, input.playerId, exerciseId, assignments);
    });

    if (updated > 0) {
      return { success: true, message: EXERCISE_UPDATED_MESSAGE };
    }
    return { success: false, error: NO_MATCHING_EXERCISE_ERROR };
  }
}
