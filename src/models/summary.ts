/**
 * Summary Models
 *
 * Cumulative per-player totals and the individual player view.
 */

import { IsoDate } from './table';
import { Player, PlayerStatus } from './player';
import { WeeklyLogEntry } from './weekly-log';
import { Report } from './report';

/**
 * Sums over every logged week of one player
 */
export interface PlayerAggregate {
  player_id: string;
  matches_total: number;
  minutes_total: number;
  goals_total: number;
  goals_conceded_total: number;
  yellow_total: number;
  red_total: number;
  last_week_end: IsoDate | null;
}

/**
 * Player joined with its aggregate (zero totals when nothing was logged)
 */
export type SummaryRow = Player & Omit<PlayerAggregate, 'player_id'>;

export interface SummaryFilters {
  statuses?: PlayerStatus[];
  positions?: string[];
  countries?: string[];
  onlyWithMinutes?: boolean;
}

export interface SummaryMetrics {
  players: number;
  minutes_total: number;
  matches_total: number;
  red_total: number;
}

export interface SummaryResult {
  rows: SummaryRow[];
  metrics: SummaryMetrics;
  filters: Required<SummaryFilters>;
  options: {
    statuses: string[];
    positions: string[];
    countries: string[];
  };
}

export interface TrendPoint {
  week_end: IsoDate | null;
  value: number;
}

export interface PlayerView {
  player: Player;
  label: string;
  goalkeeper: boolean;
  history: WeeklyLogEntry[];
  trends: {
    minutes: TrendPoint[];
    goals: TrendPoint[];   // conceded for goalkeepers, scored otherwise
  };
  reports: Report[];
}
