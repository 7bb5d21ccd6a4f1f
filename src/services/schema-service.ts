/**
 * Schema Service
 *
 * Creates the schema and seeds the skill reference data. Safe to run on
 * every process start: tables, constraints and seed rows are only added
 * when missing.
 */

import { transaction } from '../config/database';
import { SCHEMA_STATEMENTS } from '../config/schema';
import { CATEGORY_EXERCISES, CATEGORY_NAMES } from '../models/exercise';
import { ExerciseRepository } from '../repositories/exercise-repository';
import { LogLevel, log } from '../utils/logger';

/**
 * Counts of rows added by one initialization run
 */
export interface InitializationSummary {
  categoriesAdded: number;
  exercisesAdded: number;
  playerExercisesBackfilled: number;
}

export class SchemaService {
  constructor(private exerciseRepository: ExerciseRepository) {}

  /**
   * Ensure tables and seed data exist
   *
   * Players registered before an exercise was seeded get their missing
   * result rows here, so every player has one row per exercise.
   */
  async initialize(): Promise<InitializationSummary> {
    const summary = await transaction('initialize', async (client) => {
      for (const statement of SCHEMA_STATEMENTS) {
        await client.query(statement);
      }

      const categoriesAdded = await this.exerciseRepository.seedCategories(client, CATEGORY_NAMES);
      const exercisesAdded = await this.exerciseRepository.seedExercises(client, CATEGORY_EXERCISES);
      const playerExercisesBackfilled = await this.exerciseRepository.backfillPlayerExercises(client);

      return { categoriesAdded, exercisesAdded, playerExercisesBackfilled };
    });

    log(LogLevel.INFO, 'Schema initialized', {
      operation: 'initialize',
      categories_added: summary.categoriesAdded,
      exercises_added: summary.exercisesAdded,
      player_exercises_backfilled: summary.playerExercisesBackfilled,
    });

    return summary;
  }
}
