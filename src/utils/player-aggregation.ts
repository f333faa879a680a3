/**
 * Player Aggregation Utilities
 *
 * Group-by-sum of the weekly log per player, joined back onto the roster
 * for the cumulative table.
 *
 * Ordering rules for the cumulative table:
 * - minutes_total descending
 * - matches_total descending as the tie-break
 * - otherwise the roster order is kept
 */

import { Player, PlayerStatus } from '../models/player';
import { WeeklyLogEntry } from '../models/weekly-log';
import {
  PlayerAggregate,
  SummaryFilters,
  SummaryMetrics,
  SummaryRow,
} from '../models/summary';

function emptyAggregate(playerId: string): PlayerAggregate {
  return {
    player_id: playerId,
    matches_total: 0,
    minutes_total: 0,
    goals_total: 0,
    goals_conceded_total: 0,
    yellow_total: 0,
    red_total: 0,
    last_week_end: null,
  };
}

/**
 * Sum every stat per player and keep the latest week_end observed
 */
export function aggregateByPlayer(entries: WeeklyLogEntry[]): Map<string, PlayerAggregate> {
  const aggregates = new Map<string, PlayerAggregate>();

  for (const entry of entries) {
    let acc = aggregates.get(entry.player_id);
    if (!acc) {
      acc = emptyAggregate(entry.player_id);
      aggregates.set(entry.player_id, acc);
    }

    acc.matches_total += entry.matches;
    acc.minutes_total += entry.minutes;
    acc.goals_total += entry.goals_scored;
    acc.goals_conceded_total += entry.goals_conceded;
    acc.yellow_total += entry.yellow_cards;
    acc.red_total += entry.red_cards;

    // ISO dates compare correctly as strings
    if (entry.week_end && (!acc.last_week_end || entry.week_end > acc.last_week_end)) {
      acc.last_week_end = entry.week_end;
    }
  }

  return aggregates;
}

/**
 * Order rows for presentation: most minutes first, then most matches
 */
export function sortSummaryRows(rows: SummaryRow[]): SummaryRow[] {
  return [...rows].sort(
    (a, b) => b.minutes_total - a.minutes_total || b.matches_total - a.matches_total
  );
}

/**
 * Left join the aggregates onto the roster; players without entries get zeros
 */
export function buildSummary(players: Player[], entries: WeeklyLogEntry[]): SummaryRow[] {
  const aggregates = aggregateByPlayer(entries);

  const rows = players.map((player) => {
    const { player_id: _playerId, ...totals } = aggregates.get(player.id) ?? emptyAggregate(player.id);
    return { ...player, ...totals };
  });

  return sortSummaryRows(rows);
}

/**
 * Keep the rows matching every non-empty filter
 */
export function filterSummaryRows(rows: SummaryRow[], filters: Required<SummaryFilters>): SummaryRow[] {
  return rows.filter((row) => {
    if (filters.statuses.length > 0 && !filters.statuses.includes(row.status)) {
      return false;
    }
    if (filters.positions.length > 0 && !filters.positions.includes(row.position)) {
      return false;
    }
    if (filters.countries.length > 0 && !filters.countries.includes(row.loan_country)) {
      return false;
    }
    if (filters.onlyWithMinutes && row.minutes_total <= 0) {
      return false;
    }
    return true;
  });
}

/**
 * Headline numbers for the rows in view
 */
export function summaryMetrics(rows: SummaryRow[]): SummaryMetrics {
  return rows.reduce<SummaryMetrics>(
    (metrics, row) => ({
      players: metrics.players + 1,
      minutes_total: metrics.minutes_total + row.minutes_total,
      matches_total: metrics.matches_total + row.matches_total,
      red_total: metrics.red_total + row.red_total,
    }),
    { players: 0, minutes_total: 0, matches_total: 0, red_total: 0 }
  );
}

/**
 * Fill unset filters with their defaults.
 * Statuses default to Activo when at least one active player exists.
 */
export function resolveSummaryFilters(
  filters: SummaryFilters,
  players: Player[]
): Required<SummaryFilters> {
  const hasActive = players.some((p) => p.status === PlayerStatus.ACTIVE);

  return {
    statuses: filters.statuses ?? (hasActive ? [PlayerStatus.ACTIVE] : []),
    positions: filters.positions ?? [],
    countries: filters.countries ?? [],
    onlyWithMinutes: filters.onlyWithMinutes ?? true,
  };
}

/**
 * Sorted distinct non-empty values, for filter pickers
 */
export function distinctValues(values: string[]): string[] {
  return [...new Set(values.filter((value) => value.trim() !== ''))].sort((a, b) => a.localeCompare(b));
}
