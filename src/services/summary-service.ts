/**
 * Summary Service
 *
 * Cumulative table: every player joined with the totals of its weekly log,
 * filtered, plus headline metrics and the options each filter offers.
 */

import { PlayerRepository } from '../repositories/player-repository';
import { WeeklyLogRepository } from '../repositories/weekly-log-repository';
import { SummaryFilters, SummaryResult } from '../models/summary';
import {
  buildSummary,
  distinctValues,
  filterSummaryRows,
  resolveSummaryFilters,
  summaryMetrics,
} from '../utils/player-aggregation';

export class SummaryService {
  constructor(
    private playerRepository: PlayerRepository,
    private weeklyLogRepository: WeeklyLogRepository
  ) {}

  async getSummary(filters: SummaryFilters = {}): Promise<SummaryResult> {
    const [players, entries] = await Promise.all([
      this.playerRepository.findAll(),
      this.weeklyLogRepository.findAll(),
    ]);

    const resolved = resolveSummaryFilters(filters, players);
    const rows = filterSummaryRows(buildSummary(players, entries), resolved);

    return {
      rows,
      metrics: summaryMetrics(rows),
      filters: resolved,
      options: {
        statuses: distinctValues(players.map((p) => p.status)),
        positions: distinctValues(players.map((p) => p.position)),
        countries: distinctValues(players.map((p) => p.loan_country)),
      },
    };
  }
}
