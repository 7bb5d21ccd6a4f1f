/**
 * User Repository
 *
 * Data access layer for player, coach and parent accounts. Every method
 * runs on the client of the caller's transaction and uses parameterized
 * queries; only whitelisted column names are ever interpolated.
 */

import { PoolClient } from 'pg';
import {
  CoachRecord,
  CoachRow,
  ColumnAssignment,
  NewUserInput,
  ParentRecord,
  ParentRow,
  PlayerRecord,
  PlayerRow,
  ROLE_TABLES,
  Role,
  UserRecord,
  mapCoachRow,
  mapParentRow,
  mapPlayerRow,
} from '../models/user';

const ACCOUNT_SELECT = 'id, username, password, email, name, picture, birth_year, country';

const PLAYER_SELECT = `${ACCOUNT_SELECT}, number, shirt_number, parent_name, parent_email,
        parent_phone, coach_name, coach_email, coach_phone, team_name, team_id`;

const COACH_SELECT = `${ACCOUNT_SELECT}, team_name, team_id`;

const PARENT_SELECT = `${ACCOUNT_SELECT}, child_name, child_email`;

/**
 * Team details copied onto a player row when they join
 */
export interface PlayerTeamAssignment {
  teamId: number;
  teamName: string;
  coachName: string;
  coachEmail: string;
}

/**
 * User Repository
 * Provides data access methods for the three account tables
 */
export class UserRepository {
  /**
   * Insert a player and return the assigned id
   */
  async insertPlayer(client: PoolClient, input: NewUserInput): Promise<number> {
    const result = await client.query<{ id: number }>(
      `
      INSERT INTO players (username, password, email, name, birth_year, country, number, team_id)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING id
      `,
      [
        input.username,
        input.password,
        input.email,
        input.name,
        input.birthYear,
        input.country,
        input.number ?? 0,
        input.teamId ?? null,
      ]
    );
    return result.rows[0].id;
  }

  async insertCoach(client: PoolClient, input: NewUserInput): Promise<number> {
    const result = await client.query<{ id: number }>(
      `
      INSERT INTO coaches (username, password, email, name, birth_year, country, team_id)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING id
      `,
      [
        input.username,
        input.password,
        input.email,
        input.name,
        input.birthYear,
        input.country,
        input.teamId ?? null,
      ]
    );
    return result.rows[0].id;
  }

  async insertParent(client: PoolClient, input: NewUserInput): Promise<number> {
    const result = await client.query<{ id: number }>(
      `
      INSERT INTO parents (username, password, email, name, birth_year, country)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING id
      `,
      [input.username, input.password, input.email, input.name, input.birthYear, input.country]
    );
    return result.rows[0].id;
  }

  async findPlayerById(client: PoolClient, id: number): Promise<PlayerRecord | null> {
    const result = await client.query<PlayerRow>(
      `SELECT ${PLAYER_SELECT} FROM players WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
  }

  async findCoachById(client: PoolClient, id: number): Promise<CoachRecord | null> {
    const result = await client.query<CoachRow>(
      `SELECT ${COACH_SELECT} FROM coaches WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? mapCoachRow(result.rows[0]) : null;
  }

  async findParentById(client: PoolClient, id: number): Promise<ParentRecord | null> {
    const result = await client.query<ParentRow>(
      `SELECT ${PARENT_SELECT} FROM parents WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? mapParentRow(result.rows[0]) : null;
  }

  /**
   * Find an account by id in the table of the given role
   */
  async findById(client: PoolClient, role: Role, id: number): Promise<UserRecord | null> {
    switch (role) {
      case 'player':
        return this.findPlayerById(client, id);
      case 'coach':
        return this.findCoachById(client, id);
      case 'parent':
        return this.findParentById(client, id);
    }
  }

  /**
   * Find an account by email in the table of the given role
   */
  async findByEmail(client: PoolClient, role: Role, email: string): Promise<UserRecord | null> {
    switch (role) {
      case 'player': {
        const result = await client.query<PlayerRow>(
          `SELECT ${PLAYER_SELECT} FROM players WHERE email = $1`,
          [email]
        );
        return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
      }
      case 'coach': {
        const result = await client.query<CoachRow>(
          `SELECT ${COACH_SELECT} FROM coaches WHERE email = $1`,
          [email]
        );
        return result.rows.length > 0 ? mapCoachRow(result.rows[0]) : null;
      }
      case 'parent': {
        const result = await client.query<ParentRow>(
          `SELECT ${PARENT_SELECT} FROM parents WHERE email = $1`,
          [email]
        );
        return result.rows.length > 0 ? mapParentRow(result.rows[0]) : null;
      }
    }
  }

  async findPlayerByUsername(client: PoolClient, username: string): Promise<PlayerRecord | null> {
    const result = await client.query<PlayerRow>(
      `SELECT ${PLAYER_SELECT} FROM players WHERE username = $1`,
      [username]
    );
    return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
  }

  /**
   * Apply column assignments to one account row
   *
   * @param assignments - Columns taken from the role's update whitelist
   * @returns Number of rows updated
   */
  async update(
    client: PoolClient,
    role: Role,
    id: number,
    assignments: ColumnAssignment[]
  ): Promise<number> {
    const setClause = assignments
      .map((assignment, index) => `${assignment.column} = $${index + 1}`)
      .join(', ');

    const result = await client.query(
      `UPDATE ${ROLE_TABLES[role]} SET ${setClause} WHERE id = $${assignments.length + 1}`,
      [...assignments.map((assignment) => assignment.value), id]
    );
    return result.rowCount ?? 0;
  }

  /**
   * Delete a player; exercise rows and parent links cascade
   */
  async deletePlayer(client: PoolClient, id: number): Promise<number> {
    const result = await client.query('DELETE FROM players WHERE id = $1', [id]);
    return result.rowCount ?? 0;
  }

  async assignPlayerToTeam(
    client: PoolClient,
    playerId: number,
    assignment: PlayerTeamAssignment
  ): Promise<number> {
    const result = await client.query(
      `
      UPDATE players
      SET team_id = $1, team_name = $2, coach_name = $3, coach_email = $4
      WHERE id = $5
      `,
      [assignment.teamId, assignment.teamName, assignment.coachName, assignment.coachEmail, playerId]
    );
    return result.rowCount ?? 0;
  }

  async assignCoachToTeam(
    client: PoolClient,
    coachId: number,
    teamId: number,
    teamName: string
  ): Promise<number> {
    const result = await client.query(
      'UPDATE coaches SET team_id = $1, team_name = $2 WHERE id = $3',
      [teamId, teamName, coachId]
    );
    return result.rowCount ?? 0;
  }

  async setPlayerParent(
    client: PoolClient,
    playerId: number,
    parentName: string,
    parentEmail: string
  ): Promise<number> {
    const result = await client.query(
      'UPDATE players SET parent_name = $1, parent_email = $2 WHERE id = $3',
      [parentName, parentEmail, playerId]
    );
    return result.rowCount ?? 0;
  }

  async setParentChild(
    client: PoolClient,
    parentId: number,
    childName: string,
    childEmail: string
  ): Promise<number> {
    const result = await client.query(
      'UPDATE parents SET child_name = $1, child_email = $2 WHERE id = $3',
      [childName, childEmail, parentId]
    );
    return result.rowCount ?? 0;
  }
}
