/**
 * Database Schema
 *
 * DDL for the eight tables of the team management store. Every statement
 * is idempotent so the whole list can run on each process start.
 *
 * Tables created:
 * - players, coaches, parents: one table per account role
 * - teams: one team per coach
 * - categories, exercises: seeded skill reference data
 * - player_exercises: per-player result and rating for every exercise
 * - parent_players: parent/child links
 */

import { MAX_RATING, MIN_RATING } from '../models/exercise';

const ACCOUNT_COLUMNS = `
    id SERIAL PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    password TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    name TEXT NOT NULL,
    picture TEXT DEFAULT NULL,
    birth_year INTEGER NOT NULL,
    country TEXT NOT NULL`;

export const CREATE_TABLE_STATEMENTS: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS players (${ACCOUNT_COLUMNS},
    number INTEGER DEFAULT NULL,
    shirt_number INTEGER DEFAULT NULL,
    parent_name TEXT DEFAULT NULL,
    parent_email TEXT DEFAULT NULL,
    parent_phone TEXT DEFAULT NULL,
    coach_name TEXT DEFAULT NULL,
    coach_email TEXT DEFAULT NULL,
    coach_phone TEXT DEFAULT NULL,
    team_name TEXT DEFAULT NULL,
    team_id INTEGER DEFAULT NULL
  )`,
  `
  CREATE TABLE IF NOT EXISTS coaches (${ACCOUNT_COLUMNS},
    team_name TEXT DEFAULT NULL,
    team_id INTEGER DEFAULT NULL
  )`,
  `
  CREATE TABLE IF NOT EXISTS teams (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    coach_id INTEGER NOT NULL REFERENCES coaches(id)
  )`,
  `
  CREATE TABLE IF NOT EXISTS parents (${ACCOUNT_COLUMNS},
    child_name TEXT DEFAULT NULL,
    child_email TEXT DEFAULT NULL
  )`,
  `
  CREATE TABLE IF NOT EXISTS categories (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL UNIQUE
  )`,
  `
  CREATE TABLE IF NOT EXISTS parent_players (
    id SERIAL PRIMARY KEY,
    parent_id INTEGER NOT NULL REFERENCES parents(id) ON DELETE CASCADE,
    player_id INTEGER NOT NULL REFERENCES players(id) ON DELETE CASCADE,
    CONSTRAINT parent_players_pair_unique UNIQUE (parent_id, player_id)
  )`,
  `
  CREATE TABLE IF NOT EXISTS exercises (
    id SERIAL PRIMARY KEY,
    category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    CONSTRAINT exercises_category_name_unique UNIQUE (category_id, name)
  )`,
  `
  CREATE TABLE IF NOT EXISTS player_exercises (
    id SERIAL PRIMARY KEY,
    player_id INTEGER NOT NULL REFERENCES players(id) ON DELETE CASCADE,
    exercise_id INTEGER NOT NULL REFERENCES exercises(id) ON DELETE CASCADE,
    result TEXT DEFAULT NULL,
    rating INTEGER DEFAULT NULL CHECK (rating BETWEEN ${MIN_RATING} AND ${MAX_RATING}),
    CONSTRAINT player_exercises_pair_unique UNIQUE (player_id, exercise_id)
  )`,
];

/**
 * Team references on players and coaches point back at teams, which in
 * turn reference coaches, so these constraints are added once both
 * tables exist. Deleting a team clears the reference instead of the person.
 */
function addTeamReference(table: string): string {
  return `
  DO $$
  BEGIN
    IF NOT EXISTS (
      SELECT 1 FROM pg_constraint WHERE conname = '${table}_team_id_fkey'
    ) THEN
      ALTER TABLE ${table}
        ADD CONSTRAINT ${table}_team_id_fkey
        FOREIGN KEY (team_id) REFERENCES teams(id) ON DELETE SET NULL;
    END IF;
  END
  $$`;
}

export const CONSTRAINT_STATEMENTS: readonly string[] = [
  addTeamReference('players'),
  addTeamReference('coaches'),
];

export const INDEX_STATEMENTS: readonly string[] = [
  'CREATE INDEX IF NOT EXISTS idx_teams_coach_id ON teams(coach_id)',
  'CREATE INDEX IF NOT EXISTS idx_players_team_id ON players(team_id)',
  'CREATE INDEX IF NOT EXISTS idx_parent_players_player_id ON parent_players(player_id)',
  'CREATE INDEX IF NOT EXISTS idx_player_exercises_exercise_id ON player_exercises(exercise_id)',
];

export const SCHEMA_STATEMENTS: readonly string[] = [
  ...CREATE_TABLE_STATEMENTS,
  ...CONSTRAINT_STATEMENTS,
  ...INDEX_STATEMENTS,
];
