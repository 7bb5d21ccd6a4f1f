/**
 * Team Repository
 *
 * Data access layer for teams. Team names are unique; the one-team-per-coach
 * rule is checked by the service before inserting.
 */

import { PoolClient } from 'pg';
import { Team, TeamRow, mapTeamRow } from '../models/team';

/**
 * Team Repository
 * Provides data access methods for teams
 */
export class TeamRepository {
  async findByName(client: PoolClient, name: string): Promise<Team | null> {
    const result = await client.query<TeamRow>(
      'SELECT id, name, coach_id FROM teams WHERE name = $1',
      [name]
    );
    return result.rows.length > 0 ? mapTeamRow(result.rows[0]) : null;
  }

  /**
   * Find the team owned by a coach
   *
   * @returns The coach's team, or null when they have none
   */
  async findByCoachId(client: PoolClient, coachId: number): Promise<Team | null> {
    const result = await client.query<TeamRow>(
      'SELECT id, name, coach_id FROM teams WHERE coach_id = $1 ORDER BY id ASC LIMIT 1',
      [coachId]
    );
    return result.rows.length > 0 ? mapTeamRow(result.rows[0]) : null;
  }

  async insert(client: PoolClient, name: string, coachId: number): Promise<number> {
    const result = await client.query<{ id: number }>(
      'INSERT INTO teams (name, coach_id) VALUES ($1, $2) RETURNING id',
      [name, coachId]
    );
    return result.rows[0].id;
  }
}
