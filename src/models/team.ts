/**
 * Team Models
 *
 * A team is owned by exactly one coach. Players join a team by name.
 */

/**
 * Team entity from database
 */
export interface Team {
  id: number;
  name: string;                  // Unique across all teams
  coachId: number;               // Owning coach
}

/**
 * Team database row (matches PostgreSQL schema)
 */
export interface TeamRow {
  id: number;
  name: string;
  coach_id: number;
}

/**
 * Team summary returned when looking up a coach's team
 */
export interface CoachTeam {
  teamName: string;
}

/**
 * Convert database row to Team model
 */
export function mapTeamRow(row: TeamRow): Team {
  return {
    id: row.id,
    name: row.name,
    coachId: row.coach_id,
  };
}
