/**
 * Squad Repository
 *
 * Single entry point to the team management store: accounts, teams,
 * parent/child links and exercise progress. Each operation runs in its
 * own transaction on a client acquired for that call.
 */

import { closePool, isPoolHealthy } from './config/database';
import {
  ExerciseUpdateInput,
  ExerciseUpdateOutcome,
  ProgressSheet,
} from './models/exercise';
import { CoachTeam } from './models/team';
import { NewUserInput, Role, UserRecord, UserUpdate } from './models/user';
import { ExerciseRepository } from './repositories/exercise-repository';
import { ParentPlayerRepository } from './repositories/parent-player-repository';
import { TeamRepository } from './repositories/team-repository';
import { UserRepository } from './repositories/user-repository';
import { ExerciseService } from './services/exercise-service';
import { FamilyService } from './services/family-service';
import { InitializationSummary, SchemaService } from './services/schema-service';
import { TeamService } from './services/team-service';
import { UserService } from './services/user-service';

/**
 * Services backing the repository; injectable for tests
 */
export interface SquadServices {
  schema: SchemaService;
  users: UserService;
  teams: TeamService;
  exercises: ExerciseService;
  family: FamilyService;
}

export function createSquadServices(): SquadServices {
  const userRepository = new UserRepository();
  const teamRepository = new TeamRepository();
  const exerciseRepository = new ExerciseRepository();
  const parentPlayerRepository = new ParentPlayerRepository();

  return {
    schema: new SchemaService(exerciseRepository),
    users: new UserService(userRepository, exerciseRepository),
    teams: new TeamService(teamRepository, userRepository),
    exercises: new ExerciseService(exerciseRepository),
    family: new FamilyService(userRepository, parentPlayerRepository),
  };
}

export class SquadRepository {
  constructor(private services: SquadServices = createSquadServices()) {}

  initialize(): Promise<InitializationSummary> {
    return this.services.schema.initialize();
  }

  addUser(input: NewUserInput): Promise<number> {
    return this.services.users.addUser(input);
  }

  getUser(id: number, role: Role): Promise<UserRecord | null> {
    return this.services.users.getUser(id, role);
  }

  getUserByEmail(email: string): Promise<UserRecord | null> {
    return this.services.users.getUserByEmail(email);
  }

  updateUser(update: UserUpdate): Promise<void> {
    return this.services.users.updateUser(update);
  }

  deleteUser(id: number): Promise<boolean> {
    return this.services.users.deleteUser(id);
  }

  getCategoriesAndExercisesWithRatings(playerId: number): Promise<ProgressSheet> {
    return this.services.exercises.getCategoriesAndExercisesWithRatings(playerId);
  }

  updateExercise(input: ExerciseUpdateInput): Promise<ExerciseUpdateOutcome> {
    return this.services.exercises.updateExercise(input);
  }

  createTeam(teamName: string, coachId: number): Promise<number> {
    return this.services.teams.createTeam(teamName, coachId);
  }

  getTeamByCoach(coachId: number): Promise<CoachTeam | null> {
    return this.services.teams.getTeamByCoach(coachId);
  }

  joinTeam(teamName: string, playerId: number): Promise<void> {
    return this.services.teams.joinTeam(teamName, playerId);
  }

  linkChild(childUsername: string, parentId: number): Promise<void> {
    return this.services.family.linkChild(childUsername, parentId);
  }

  isHealthy(): Promise<boolean> {
    return isPoolHealthy();
  }

  /**
   * Release pooled connections; call once on shutdown
   */
  close(): Promise<void> {
    return closePool();
  }
}
