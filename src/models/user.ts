/**
 * User Models
 *
 * Players, coaches and parents each live in their own table. A record is
 * tagged with its role so callers can branch on `record.role` and get the
 * field set that belongs to that kind of account.
 */

export const ROLES = ['player', 'coach', 'parent'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Table holding each role's accounts
 */
export const ROLE_TABLES: Record<Role, string> = {
  player: 'players',
  coach: 'coaches',
  parent: 'parents',
};

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Identity fields shared by every account
 */
interface AccountFields {
  id: number;
  username: string;
  password: string;              // Opaque, stored as given
  email: string;
  name: string;
  picture?: string;
  birthYear: number;
  country: string;
}

export interface PlayerRecord extends AccountFields {
  role: 'player';
  number?: number;               // Contact number, 0 when not given at registration
  shirtNumber?: number;
  parentName?: string;
  parentEmail?: string;
  parentPhone?: string;
  coachName?: string;
  coachEmail?: string;
  coachPhone?: string;
  teamName?: string;
  teamId?: number;
}

export interface CoachRecord extends AccountFields {
  role: 'coach';
  teamName?: string;
  teamId?: number;
}

export interface ParentRecord extends AccountFields {
  role: 'parent';
  childName?: string;
  childEmail?: string;
}

export type UserRecord = PlayerRecord | CoachRecord | ParentRecord;

/**
 * Columns shared by the three account tables
 */
interface AccountRow {
  id: number;
  username: string;
  password: string;
  email: string;
  name: string;
  picture: string | null;
  birth_year: number;
  country: string;
}

export interface PlayerRow extends AccountRow {
  number: number | null;
  shirt_number: number | null;
  parent_name: string | null;
  parent_email: string | null;
  parent_phone: string | null;
  coach_name: string | null;
  coach_email: string | null;
  coach_phone: string | null;
  team_name: string | null;
  team_id: number | null;
}

export interface CoachRow extends AccountRow {
  team_name: string | null;
  team_id: number | null;
}

export interface ParentRow extends AccountRow {
  child_name: string | null;
  child_email: string | null;
}

function mapAccountRow(row: AccountRow): AccountFields {
  return {
    id: row.id,
    username: row.username,
    password: row.password,
    email: row.email,
    name: row.name,
    picture: row.picture || undefined,
    birthYear: row.birth_year,
    country: row.country,
  };
}

export function mapPlayerRow(row: PlayerRow): PlayerRecord {
  return {
    ...mapAccountRow(row),
    role: 'player',
    number: row.number ?? undefined,
    shirtNumber: row.shirt_number ?? undefined,
    parentName: row.parent_name || undefined,
    parentEmail: row.parent_email || undefined,
    parentPhone: row.parent_phone || undefined,
    coachName: row.coach_name || undefined,
    coachEmail: row.coach_email || undefined,
    coachPhone: row.coach_phone || undefined,
    teamName: row.team_name || undefined,
    teamId: row.team_id ?? undefined,
  };
}

export function mapCoachRow(row: CoachRow): CoachRecord {
  return {
    ...mapAccountRow(row),
    role: 'coach',
    teamName: row.team_name || undefined,
    teamId: row.team_id ?? undefined,
  };
}

export function mapParentRow(row: ParentRow): ParentRecord {
  return {
    ...mapAccountRow(row),
    role: 'parent',
    childName: row.child_name || undefined,
    childEmail: row.child_email || undefined,
  };
}

/**
 * Registration payload
 */
export interface NewUserInput {
  username: string;
  password: string;
  email: string;
  name: string;
  birthYear: number;
  country: string;
  role: Role;
  number?: number | null;        // Players only, defaults to 0
  teamId?: number | null;        // Players and coaches
}

/**
 * Profile fields any account may change
 */
export interface AccountUpdateFields {
  username?: string;
  password?: string;
  email?: string;
  name?: string;
  picture?: string | null;
  birthYear?: number;
  country?: string;
}

export interface PlayerUpdateFields extends AccountUpdateFields {
  number?: number | null;
  shirtNumber?: number | null;
  parentPhone?: string | null;
  coachPhone?: string | null;
}

export type CoachUpdateFields = AccountUpdateFields;

export type ParentUpdateFields = AccountUpdateFields;

/**
 * Profile update, tagged by the role whose table is written
 */
export type UserUpdate =
  | { role: 'player'; id: number; fields: PlayerUpdateFields }
  | { role: 'coach'; id: number; fields: CoachUpdateFields }
  | { role: 'parent'; id: number; fields: ParentUpdateFields };

/**
 * Field-to-column whitelists. Only these columns can appear in an UPDATE.
 */
const ACCOUNT_UPDATE_COLUMNS = [
  ['username', 'username'],
  ['password', 'password'],
  ['email', 'email'],
  ['name', 'name'],
  ['picture', 'picture'],
  ['birthYear', 'birth_year'],
  ['country', 'country'],
] as const;

export const PLAYER_UPDATE_COLUMNS: ReadonlyArray<readonly [keyof PlayerUpdateFields, string]> = [
  ...ACCOUNT_UPDATE_COLUMNS,
  ['number', 'number'],
  ['shirtNumber', 'shirt_number'],
  ['parentPhone', 'parent_phone'],
  ['coachPhone', 'coach_phone'],
];

export const COACH_UPDATE_COLUMNS: ReadonlyArray<readonly [keyof CoachUpdateFields, string]> =
  ACCOUNT_UPDATE_COLUMNS;

export const PARENT_UPDATE_COLUMNS: ReadonlyArray<readonly [keyof ParentUpdateFields, string]> =
  ACCOUNT_UPDATE_COLUMNS;

/**
 * A single `column = value` pair of an UPDATE statement
 */
export interface ColumnAssignment {
  column: string;
  value: unknown;
}

/**
 * Collect assignments for the supplied fields, in whitelist order
 */
export function toColumnAssignments<F extends object>(
  fields: F,
  columns: ReadonlyArray<readonly [keyof F, string]>
): ColumnAssignment[] {
  const assignments: ColumnAssignment[] = [];
  for (const [field, column] of columns) {
    const value = fields[field];
    if (value !== undefined) {
      assignments.push({ column, value });
    }
  }
  return assignments;
}
