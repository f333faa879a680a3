/**
 * Player View Service
 *
 * Everything shown for one player: identity, weekly history, trend series
 * and reports.
 */

import { PlayerRepository } from '../repositories/player-repository';
import { WeeklyLogRepository } from '../repositories/weekly-log-repository';
import { ReportRepository } from '../repositories/report-repository';
import { isGoalkeeper, playerLabel } from '../models/player';
import { compareByWeekEnd } from '../models/weekly-log';
import { compareReportsNewestFirst } from '../models/report';
import { PlayerView } from '../models/summary';
import { NotFoundError } from '../models/errors';

export class PlayerViewService {
  constructor(
    private playerRepository: PlayerRepository,
    private weeklyLogRepository: WeeklyLogRepository,
    private reportRepository: ReportRepository
  ) {}

  /**
   * Build the individual view of a player
   *
   * The goals trend follows goals conceded for goalkeepers and goals scored
   * for everyone else.
   *
   * @throws NotFoundError if the player doesn't exist
   */
  async getPlayerView(playerId: string): Promise<PlayerView> {
    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new NotFoundError('Player not found');
    }

    const [entries, reports] = await Promise.all([
      this.weeklyLogRepository.findByPlayerId(playerId),
      this.reportRepository.findByPlayerId(playerId),
    ]);

    const history = entries.sort(compareByWeekEnd);
    const goalkeeper = isGoalkeeper(player.position);

    return {
      player,
      label: playerLabel(player),
      goalkeeper,
      history,
      trends: {
        minutes: history.map((entry) => ({ week_end: entry.week_end, value: entry.minutes })),
        goals: history.map((entry) => ({
          week_end: entry.week_end,
          value: goalkeeper ? entry.goals_conceded : entry.goals_scored,
        })),
      },
      reports: reports.sort(compareReportsNewestFirst),
    };
  }
}
