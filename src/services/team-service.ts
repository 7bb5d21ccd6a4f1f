/**
 * Team Service
 *
 * Business logic layer for team creation, lookup and players joining a team.
 */

import { transaction } from '../config/database';
import {
  ConflictError,
  InconsistentStateError,
  InvalidInputError,
  NotFoundError,
  UniquenessViolationError,
} from '../models/errors';
import { CoachTeam } from '../models/team';
import { TeamRepository } from '../repositories/team-repository';
import { UserRepository } from '../repositories/user-repository';
import { LogLevel, log } from '../utils/logger';

/**
 * Team Service
 * Provides business logic for team operations
 */
export class TeamService {
  constructor(
    private teamRepository: TeamRepository,
    private userRepository: UserRepository
  ) {}

  /**
   * Create a team owned by a coach
   *
   * The coach's row is updated with the new team in the same transaction.
   *
   * @returns Identifier of the new team
   * @throws ConflictError if the name is taken or the coach already has a team
   * @throws NotFoundError if the coach doesn't exist
   */
  async createTeam(teamName: string, coachId: number): Promise<number> {
    if (!teamName || !teamName.trim()) {
      throw new InvalidInputError('Team name is required');
    }

    try {
      return await transaction('createTeam', async (client) => {
        if (await this.teamRepository.findByName(client, teamName)) {
          throw new ConflictError('Team name already exists');
        }

        if (await this.teamRepository.findByCoachId(client, coachId)) {
          throw new ConflictError('Coach already has a team');
        }

        const coach = await this.userRepository.findCoachById(client, coachId);
        if (!coach) {
          throw new NotFoundError('Coach not found');
        }

        const teamId = await this.teamRepository.insert(client, teamName, coachId);
        await this.userRepository.assignCoachToTeam(client, coachId, teamId, teamName);

        log(LogLevel.INFO, 'Team created', { operation: 'createTeam', team_id: teamId, coach_id: coachId });
        return teamId;
      });
    } catch (error) {
      // A concurrent insert of the same name loses on the unique constraint
      if (error instanceof UniquenessViolationError && error.constraint === 'teams_name_key') {
        throw new ConflictError('Team name already exists');
      }
      throw error;
    }
  }

  /**
   * Get the name of the team a coach owns
   *
   * @returns `{ teamName }`, or null when the coach has no team
   */
  async getTeamByCoach(coachId: number): Promise<CoachTeam | null> {
    const team = await transaction('getTeamByCoach', (client) =>
      this.teamRepository.findByCoachId(client, coachId)
    );
    return team ? { teamName: team.name } : null;
  }

  /**
   * Put a player on a team and copy the coach's contact onto their profile
   *
   * @throws NotFoundError if the team or the player doesn't exist
   * @throws InconsistentStateError if the team's coach row is missing
   */
  async joinTeam(teamName: string, playerId: number): Promise<void> {
    await transaction('joinTeam', async (client) => {
      const team = await this.teamRepository.findByName(client, teamName);
      if (!team) {
        throw new NotFoundError('Team not found');
      }

      const coach = await this.userRepository.findCoachById(client, team.coachId);
      if (!coach) {
        throw new InconsistentStateError('Coach not found');
      }

      const updated = await this.userRepository.assignPlayerToTeam(client, playerId, {
        teamId: team.id,
        teamName: team.name,
        coachName: coach.name,
        coachEmail: coach.email,
      });
      if (updated === 0) {
        throw new NotFoundError('Player not found');
      }

      log(LogLevel.INFO, 'Player joined team', { operation: 'joinTeam', team_id: team.id, player_id: playerId });
    });
  }
}
