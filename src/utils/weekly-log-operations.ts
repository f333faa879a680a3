/**
 * Weekly Log Operations
 *
 * Pure append and bulk replace over the weekly log. At most one entry may
 * exist per (player, week_start); the check happens here, before insert,
 * since the worksheet itself enforces nothing.
 */

import { v4 as uuidv4 } from 'uuid';
import { WeeklyEntryInput, WeeklyLogEntry } from '../models/weekly-log';
import { IsoDate, Timestamp } from '../models/table';
import { DuplicateWeekError } from '../models/errors';
import { completeWeekWindow } from './week-window';

export type AppendResult =
  | { ok: true; entries: WeeklyLogEntry[]; entry: WeeklyLogEntry }
  | { ok: false; reason: 'duplicate_week'; existing: WeeklyLogEntry };

/**
 * Find the entry already logged for a player's week
 */
export function findWeeklyEntry(
  entries: WeeklyLogEntry[],
  playerId: string,
  weekStart: IsoDate
): WeeklyLogEntry | undefined {
  return entries.find((entry) => entry.player_id === playerId && entry.week_start === weekStart);
}

/**
 * Append a new weekly entry unless the player's week is already logged.
 * On duplicates the entries are returned untouched by omission.
 */
export function appendWeeklyEntry(
  entries: WeeklyLogEntry[],
  input: WeeklyEntryInput,
  now: Timestamp
): AppendResult {
  const existing = findWeeklyEntry(entries, input.player_id, input.week_start);
  if (existing) {
    return { ok: false, reason: 'duplicate_week', existing };
  }

  const entry: WeeklyLogEntry = {
    id: uuidv4(),
    ...input,
    created_at: now,
    updated_at: now,
  };

  return { ok: true, entries: [...entries, entry], entry };
}

/**
 * A row of the weekly log as submitted from a table edit
 */
export type EditedWeeklyRow = Partial<Omit<WeeklyLogEntry, 'player_id'>> & { player_id: string };

/**
 * Replace the whole weekly log with an edited copy
 *
 * Every row gets updated_at = now; blank created_at becomes now and blank
 * ids get a fresh UUID. Missing week boundaries are derived from the other.
 *
 * @throws DuplicateWeekError when two rows share player and week_start
 */
export function replaceWeeklyLog(rows: EditedWeeklyRow[], now: Timestamp): WeeklyLogEntry[] {
  const seen = new Set<string>();

  return rows.map((row) => {
    const window = completeWeekWindow(row.week_start ?? null, row.week_end ?? null);

    if (window.week_start) {
      const key = `${row.player_id}|${window.week_start}`;
      if (seen.has(key)) {
        throw new DuplicateWeekError(row.player_id, window.week_start);
      }
      seen.add(key);
    }

    return {
      id: row.id?.trim() ? row.id : uuidv4(),
      player_id: row.player_id,
      week_start: window.week_start,
      week_end: window.week_end,
      matches: row.matches ?? 0,
      minutes: row.minutes ?? 0,
      goals_scored: row.goals_scored ?? 0,
      goals_conceded: row.goals_conceded ?? 0,
      yellow_cards: row.yellow_cards ?? 0,
      red_cards: row.red_cards ?? 0,
      incidents: row.incidents ?? '',
      created_at: row.created_at?.trim() ? row.created_at : now,
      updated_at: now,
    };
  });
}
