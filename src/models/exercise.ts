/**
 * Exercise Models
 *
 * Skill categories and their exercises are reference data seeded at
 * startup. Each player carries one result/rating row per exercise.
 */

/**
 * Seeded skill categories, in display order
 */
export const CATEGORY_NAMES = ['PAC', 'SHO', 'PAS', 'DRI', 'DEF', 'PHY'] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

/**
 * Seeded exercises per category
 */
export const CATEGORY_EXERCISES: Record<CategoryName, readonly string[]> = {
  PAC: ['Sprint Speed', 'Acceleration'],
  SHO: ['Shot Speed (radar)', 'Long Shots', 'Free Kick Accuracy'],
  PAS: ['Short Passing', 'Long Passing', 'Crossing'],
  DRI: ['Zidane Fake Pass', 'Stepovers', 'Elastico'],
  DEF: ['Tackling', 'Marking', 'Interceptions'],
  PHY: ['Strength', 'Stamina', 'Jumping'],
};

export const MIN_RATING = 1;
export const MAX_RATING = 5;

/**
 * Placeholder result clients send for "no result recorded"
 */
export const RESULT_PLACEHOLDER = 'N/A';

/**
 * One exercise in a player's progress sheet
 */
export interface ExerciseProgress {
  exercise: string;
  result: string | null;         // e.g. "45 km/h"
  rating: number | null;         // 1-5 self-assessment
}

/**
 * Category name -> exercises, in category order
 */
export type ProgressSheet = Record<string, ExerciseProgress[]>;

/**
 * Row of the category/exercise/player_exercise left join
 */
export interface ExerciseProgressRow {
  category: string;
  exercise: string;
  result: string | null;
  rating: number | null;
}

/**
 * Result/rating update for one of a player's exercises
 */
export interface ExerciseUpdateInput {
  exercise: string;
  playerId: number;
  result?: string | null;
  rating?: number | null;
}

export type ExerciseUpdateOutcome =
  | { success: true; message: string }
  | { success: false; error: string };

/**
 * Group join rows by category, keeping the order categories first appear in
 */
export function groupProgressRows(rows: ExerciseProgressRow[]): ProgressSheet {
  const sheet: ProgressSheet = {};

  for (const row of rows) {
    if (!sheet[row.category]) {
      sheet[row.category] = [];
    }
    sheet[row.category].push({
      exercise: row.exercise,
      result: row.result || null,
      rating: row.rating || null,
    });
  }

  return sheet;
}
