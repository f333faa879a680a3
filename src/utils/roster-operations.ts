/**
 * Roster Operations
 *
 * Pure insert-or-update, soft delete and cascading hard delete over the
 * in-memory player, weekly log and report tables. Callers persist the
 * returned tables.
 */

import { v4 as uuidv4 } from 'uuid';
import { addMonths, addYears } from 'date-fns';
import { Player, PlayerFields, PlayerStatus, POSITIONS, DIVISIONS } from '../models/player';
import { WeeklyLogEntry } from '../models/weekly-log';
import { Report } from '../models/report';
import { Timestamp } from '../models/table';
import { NotFoundError } from '../models/errors';
import { formatIsoDate } from './row-normalizer';

/**
 * Fields of a player row nobody has filled in yet
 */
const BLANK_PLAYER_FIELDS: PlayerFields = {
  name: '',
  position: '',
  birth_date: null,
  loan_country: '',
  loan_division: '',
  loan_club: '',
  buy_option: false,
  buy_back: false,
  return_date: null,
  contract_end: null,
  status: PlayerStatus.ACTIVE,
  notes: '',
};

/**
 * Input for a new player: a name plus any subset of the other fields
 */
export type NewPlayerInput = Partial<PlayerFields> & { name: string };

/**
 * Apply the creation defaults to the fields the caller left out
 *
 * @param input - Submitted fields
 * @param today - Reference date for the return and contract-end defaults
 */
export function buildNewPlayerFields(input: NewPlayerInput, today: Date = new Date()): PlayerFields {
  return {
    name: input.name,
    position: input.position ?? POSITIONS[0],
    birth_date: input.birth_date === undefined ? '2000-01-01' : input.birth_date,
    loan_country: input.loan_country ?? '',
    loan_division: input.loan_division ?? DIVISIONS[0],
    loan_club: input.loan_club ?? '',
    buy_option: input.buy_option ?? false,
    buy_back: input.buy_back ?? false,
    return_date: input.return_date === undefined ? formatIsoDate(addMonths(today, 6)) : input.return_date,
    contract_end: input.contract_end === undefined ? formatIsoDate(addYears(today, 2)) : input.contract_end,
    status: input.status ?? PlayerStatus.ACTIVE,
    notes: input.notes ?? '',
  };
}

/**
 * Insert or update a player by id
 *
 * An existing player gets the given fields applied and a new updated_at;
 * id and created_at never change. Otherwise a new player is appended with
 * the given id (or a generated one) and both timestamps set to `now`.
 * Keys present in `fields` must not hold undefined.
 */
export function upsertPlayer(
  players: Player[],
  id: string | null,
  fields: Partial<PlayerFields>,
  now: Timestamp
): { players: Player[]; player: Player; created: boolean } {
  const index = id ? players.findIndex((p) => p.id === id) : -1;

  if (index >= 0) {
    const updated: Player = {
      ...players[index],
      ...fields,
      updated_at: now,
    };
    const next = [...players];
    next[index] = updated;
    return { players: next, player: updated, created: false };
  }

  const player: Player = {
    ...BLANK_PLAYER_FIELDS,
    ...fields,
    id: id ?? uuidv4(),
    created_at: now,
    updated_at: now,
  };

  return { players: [...players, player], player, created: true };
}

/**
 * Mark a player as terminated, keeping every historical row
 *
 * @param reason - Appended to the notes as "[Rescindido: reason]" when not blank
 */
export function softDeletePlayer(
  players: Player[],
  id: string,
  reason: string | undefined,
  now: Timestamp
): { players: Player[]; player: Player } {
  const existing = players.find((p) => p.id === id);
  if (!existing) {
    throw new NotFoundError('Player not found');
  }

  let notes = existing.notes;
  const trimmedReason = reason?.trim() ?? '';
  if (trimmedReason) {
    const note = `[${PlayerStatus.TERMINATED}: ${trimmedReason}]`;
    notes = notes.trim() ? `${notes}\n${note}` : note;
  }

  const { players: next, player } = upsertPlayer(
    players,
    id,
    { status: PlayerStatus.TERMINATED, notes },
    now
  );

  return { players: next, player };
}

/**
 * All tables that reference a player
 */
export interface RosterTables {
  players: Player[];
  weeklyLog: WeeklyLogEntry[];
  reports: Report[];
}

export interface HardDeleteResult {
  tables: RosterTables;
  removed: {
    players: number;
    weekly_entries: number;
    reports: number;
  };
}

/**
 * Remove a player and every weekly entry and report referencing it
 */
export function hardDeletePlayer(tables: RosterTables, id: string): HardDeleteResult {
  if (!tables.players.some((p) => p.id === id)) {
    throw new NotFoundError('Player not found');
  }

  const players = tables.players.filter((p) => p.id !== id);
  const weeklyLog = tables.weeklyLog.filter((entry) => entry.player_id !== id);
  const reports = tables.reports.filter((report) => report.player_id !== id);

  return {
    tables: { players, weeklyLog, reports },
    removed: {
      players: tables.players.length - players.length,
      weekly_entries: tables.weeklyLog.length - weeklyLog.length,
      reports: tables.reports.length - reports.length,
    },
  };
}
