/**
 * Weekly Log Models
 *
 * One row per player and week with the week's match statistics.
 */

import { IsoDate, TableDefinition, TableName, Timestamp } from './table';
import { RowReader, encodeDate, encodeInt } from '../utils/row-normalizer';
import { WeekConvention, completeWeekWindow } from '../utils/week-window';

/**
 * Weekly log entry
 */
export interface WeeklyLogEntry {
  id: string;                    // UUID
  player_id: string;             // references Player.id by value
  week_start: IsoDate | null;
  week_end: IsoDate | null;
  matches: number;
  minutes: number;
  goals_scored: number;
  goals_conceded: number;
  yellow_cards: number;
  red_cards: number;
  incidents: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

/**
 * Statistics captured for a week
 */
export interface WeeklyStats {
  matches: number;
  minutes: number;
  goals_scored: number;
  goals_conceded: number;
  yellow_cards: number;
  red_cards: number;
  incidents: string;
}

/**
 * New entry before identity and timestamps are assigned
 */
export interface WeeklyEntryInput extends WeeklyStats {
  player_id: string;
  week_start: IsoDate;
  week_end: IsoDate;
}

export const STAT_COLUMNS = [
  'partidos',
  'minutos',
  'goles_marcados',
  'goles_encajados',
  'amarillas',
  'rojas',
] as const;

const MONDAY_COLUMNS = [
  'registro_id',
  'jugador_id',
  'week_start',
  'week_end',
  ...STAT_COLUMNS,
  'incidencias',
  'created_at',
  'updated_at',
];

/**
 * Worksheet definition for the weekly log.
 * The sunday convention keeps the original single week_end shape.
 */
export function weeklyLogTable(convention: WeekConvention): TableDefinition {
  return {
    name: TableName.WEEKLY_LOG,
    columns: convention === 'sunday'
      ? MONDAY_COLUMNS.filter((column) => column !== 'week_start')
      : MONDAY_COLUMNS,
  };
}

/**
 * Convert a worksheet row to a WeeklyLogEntry
 */
export function mapWeeklyLogRow(row: RowReader): WeeklyLogEntry {
  const window = completeWeekWindow(row.date('week_start'), row.date('week_end'));

  return {
    id: row.text('registro_id'),
    player_id: row.text('jugador_id'),
    week_start: window.week_start,
    week_end: window.week_end,
    matches: row.int('partidos'),
    minutes: row.int('minutos'),
    goals_scored: row.int('goles_marcados'),
    goals_conceded: row.int('goles_encajados'),
    yellow_cards: row.int('amarillas'),
    red_cards: row.int('rojas'),
    incidents: row.text('incidencias'),
    created_at: row.text('created_at'),
    updated_at: row.text('updated_at'),
  };
}

/**
 * Convert a WeeklyLogEntry to worksheet cells keyed by column
 */
export function weeklyLogToRecord(entry: WeeklyLogEntry): Record<string, string> {
  return {
    registro_id: entry.id,
    jugador_id: entry.player_id,
    week_start: encodeDate(entry.week_start),
    week_end: encodeDate(entry.week_end),
    partidos: encodeInt(entry.matches),
    minutos: encodeInt(entry.minutes),
    goles_marcados: encodeInt(entry.goals_scored),
    goles_encajados: encodeInt(entry.goals_conceded),
    amarillas: encodeInt(entry.yellow_cards),
    rojas: encodeInt(entry.red_cards),
    incidencias: entry.incidents,
    created_at: entry.created_at,
    updated_at: entry.updated_at,
  };
}

/**
 * Oldest week first; entries without a week_end sort before dated ones
 */
export function compareByWeekEnd(a: WeeklyLogEntry, b: WeeklyLogEntry): number {
  return (a.week_end ?? '').localeCompare(b.week_end ?? '');
}
