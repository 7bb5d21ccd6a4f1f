/**
 * Exercise Repository
 *
 * Data access layer for skill categories, exercises and the per-player
 * result/rating rows.
 */

import { PoolClient } from 'pg';
import { ColumnAssignment } from '../models/user';
import { ExerciseProgressRow } from '../models/exercise';

/**
 * Exercise Repository
 * Provides seeding, progress lookup and result updates
 */
export class ExerciseRepository {
  /**
   * Insert categories that are not present yet, in the given order
   */
  async seedCategories(client: PoolClient, names: readonly string[]): Promise<number> {
    const result = await client.query(
      `
      INSERT INTO categories (name)
      SELECT name FROM unnest($1::text[]) WITH ORDINALITY AS seed(name, position)
      ORDER BY position
      ON CONFLICT (name) DO NOTHING
      `,
      [[...names]]
    );
    return result.rowCount ?? 0;
  }

  /**
   * Insert exercises that are not present yet
   *
   * @param exercises - Category name -> exercise names
   */
  async seedExercises(
    client: PoolClient,
    exercises: Readonly<Record<string, readonly string[]>>
  ): Promise<number> {
    const categoryNames: string[] = [];
    const exerciseNames: string[] = [];
    for (const [category, names] of Object.entries(exercises)) {
      for (const name of names) {
        categoryNames.push(category);
        exerciseNames.push(name);
      }
    }

    const result = await client.query(
      `
      INSERT INTO exercises (category_id, name)
      SELECT c.id, seed.name
      FROM unnest($1::text[], $2::text[]) WITH ORDINALITY AS seed(category, name, position)
      INNER JOIN categories c ON c.name = seed.category
      ORDER BY seed.position
      ON CONFLICT (category_id, name) DO NOTHING
      `,
      [categoryNames, exerciseNames]
    );
    return result.rowCount ?? 0;
  }

  /**
   * Create an empty result row for every exercise for a new player
   */
  async createForPlayer(client: PoolClient, playerId: number): Promise<number> {
    const result = await client.query(
      `
      INSERT INTO player_exercises (player_id, exercise_id)
      SELECT $1, e.id FROM exercises e
      ORDER BY e.id
      `,
      [playerId]
    );
    return result.rowCount ?? 0;
  }

  /**
   * Add the rows missing for any (player, exercise) pair
   *
   * @returns Number of rows created
   */
  async backfillPlayerExercises(client: PoolClient): Promise<number> {
    const result = await client.query(`
      INSERT INTO player_exercises (player_id, exercise_id)
      SELECT p.id, e.id
      FROM players p
      CROSS JOIN exercises e
      ON CONFLICT (player_id, exercise_id) DO NOTHING
    `);
    return result.rowCount ?? 0;
  }

  /**
   * Resolve an exercise name to its id
   *
   * Seeded names are unique across categories; the lowest id wins otherwise.
   */
  async findIdByName(client: PoolClient, name: string): Promise<number | null> {
    const result = await client.query<{ id: number }>(
      'SELECT id FROM exercises WHERE name = $1 ORDER BY id ASC LIMIT 1',
      [name]
    );
    return result.rows.length > 0 ? result.rows[0].id : null;
  }

  /**
   * Every category/exercise pair with the player's result and rating
   *
   * Pairs the player has no row for come back with null result and rating.
   */
  async findProgressByPlayer(client: PoolClient, playerId: number): Promise<ExerciseProgressRow[]> {
    const result = await client.query<ExerciseProgressRow>(
      `
      SELECT
        c.name AS category,
        e.name AS exercise,
        pe.result,
        pe.rating
      FROM categories c
      INNER JOIN exercises e ON c.id = e.category_id
      LEFT JOIN player_exercises pe ON e.id = pe.exercise_id AND pe.player_id = $1
      ORDER BY c.id ASC, e.id ASC
      `,
      [playerId]
    );
    return result.rows;
  }

  /**
   * Update result and/or rating of one player's exercise row
   *
   * @returns Number of rows updated
   */
  async updateForPlayer(
    client: PoolClient,
    playerId: number,
    exerciseId: number,
    assignments: ColumnAssignment[]
  ): Promise<number> {
    const setClause = assignments
      .map((assignment, index) => `${assignment.column} = $${index + 1}`)
      .join(', ');
    const next = assignments.length + 1;

    const result = await client.query(
      `UPDATE player_exercises SET ${setClause} WHERE player_id = $${next} AND exercise_id = $${next + 1}`,
      [...assignments.map((assignment) => assignment.value), playerId, exerciseId]
    );
    return result.rowCount ?? 0;
  }
}
