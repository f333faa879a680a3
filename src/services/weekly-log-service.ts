/**
 * Weekly Log Service
 *
 * Business logic for weekly capture: week windows, logging a week with
 * duplicate-week rejection, histories and the admin bulk replace.
 */

import { WeeklyLogRepository } from '../repositories/weekly-log-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { PlayerStatus } from '../models/player';
import { WeeklyLogEntry, WeeklyStats, compareByWeekEnd } from '../models/weekly-log';
import { BadRequestError, DuplicateWeekError, NotFoundError } from '../models/errors';
import { WeekConvention, WeekWindow, getWeekWindow, parseWeekDate } from '../utils/week-window';
import { EditedWeeklyRow, appendWeeklyEntry, replaceWeeklyLog } from '../utils/weekly-log-operations';
import { formatTimestamp } from '../utils/row-normalizer';
import { emitDuplicateWeekRejected } from '../utils/metrics';

/**
 * A week to log: any date inside the week plus the counters entered.
 * Omitted counters are 0.
 */
export interface LogWeekInput extends Partial<WeeklyStats> {
  player_id: string;
  date?: string;
}

export class WeeklyLogService {
  constructor(
    private weeklyLogRepository: WeeklyLogRepository,
    private playerRepository: PlayerRepository,
    private convention: WeekConvention = 'monday'
  ) {}

  /**
   * Week window containing a date (today when omitted)
   *
   * @throws BadRequestError if the date cannot be parsed
   */
  getWeekWindow(date?: string): WeekWindow {
    if (date === undefined || date.trim() === '') {
      return getWeekWindow(new Date(), this.convention);
    }

    const parsed = parseWeekDate(date);
    if (!parsed) {
      throw new BadRequestError('Invalid date', { date: 'Invalid format, expected date' });
    }
    return getWeekWindow(parsed, this.convention);
  }

  /**
   * Log a week for an active player
   *
   * @throws NotFoundError if the player doesn't exist
   * @throws BadRequestError if the player is not Activo
   * @throws DuplicateWeekError if the player's week is already logged
   */
  async logWeek(input: LogWeekInput): Promise<WeeklyLogEntry> {
    const player = await this.playerRepository.findById(input.player_id);
    if (!player) {
      throw new NotFoundError('Player not found');
    }
    if (player.status !== PlayerStatus.ACTIVE) {
      throw new BadRequestError(`Only active players can log weeks (status: ${player.status})`);
    }

    const window = this.getWeekWindow(input.date);
    const entries = await this.weeklyLogRepository.findAll();

    const result = appendWeeklyEntry(
      entries,
      {
        player_id: input.player_id,
        week_start: window.week_start,
        week_end: window.week_end,
        matches: input.matches ?? 0,
        minutes: input.minutes ?? 0,
        goals_scored: input.goals_scored ?? 0,
        goals_conceded: input.goals_conceded ?? 0,
        yellow_cards: input.yellow_cards ?? 0,
        red_cards: input.red_cards ?? 0,
        incidents: input.incidents ?? '',
      },
      formatTimestamp()
    );

    if (!result.ok) {
      await emitDuplicateWeekRejected();
      throw new DuplicateWeekError(input.player_id, window.week_start);
    }

    await this.weeklyLogRepository.saveAll(result.entries);
    return result.entry;
  }

  /**
   * Weekly history of a player, newest week first
   */
  async listForPlayer(playerId: string): Promise<WeeklyLogEntry[]> {
    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new NotFoundError('Player not found');
    }

    const entries = await this.weeklyLogRepository.findByPlayerId(playerId);
    return entries.sort((a, b) => compareByWeekEnd(b, a));
  }

  async listAll(): Promise<WeeklyLogEntry[]> {
    return this.weeklyLogRepository.findAll();
  }

  /**
   * Replace the whole weekly log with an edited copy
   *
   * @throws DuplicateWeekError if two rows share player and week; nothing is written
   */
  async replaceAll(rows: EditedWeeklyRow[]): Promise<WeeklyLogEntry[]> {
    let entries: WeeklyLogEntry[];
    try {
      entries = replaceWeeklyLog(rows, formatTimestamp());
    } catch (error) {
      if (error instanceof DuplicateWeekError) {
        await emitDuplicateWeekRejected();
      }
      throw error;
    }

    await this.weeklyLogRepository.saveAll(entries);
    return entries;
  }
}
