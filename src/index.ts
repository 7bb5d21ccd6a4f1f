/**
 * Squadtrack Backend
 *
 * Data-access layer for youth team management.
 */

export * from './config/environment';
export * from './models/errors';
export * from './models/exercise';
export * from './models/team';
export * from './models/user';
export type { InitializationSummary } from './services/schema-service';
export type { SquadServices } from './squad-repository';
export { SquadRepository, createSquadServices } from './squad-repository';
