/**
 * Report Service
 *
 * Reports are created and listed; there is no edit path.
 */

import { v4 as uuidv4 } from 'uuid';
import { ReportRepository } from '../repositories/report-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { Report, compareReportsNewestFirst } from '../models/report';
import { IsoDate } from '../models/table';
import { BadRequestError, NotFoundError } from '../models/errors';
import { formatIsoDate, formatTimestamp } from '../utils/row-normalizer';

export interface CreateReportInput {
  title: string;
  body: string;
  report_date?: IsoDate | null;   // defaults to today
}

export class ReportService {
  constructor(
    private reportRepository: ReportRepository,
    private playerRepository: PlayerRepository
  ) {}

  /**
   * Attach a new report to a player
   *
   * @throws NotFoundError if the player doesn't exist
   * @throws BadRequestError if title or body is blank
   */
  async createReport(playerId: string, input: CreateReportInput): Promise<Report> {
    const details: Record<string, string> = {};
    if (input.title.trim() === '') {
      details.title = 'Must not be empty';
    }
    if (input.body.trim() === '') {
      details.body = 'Must not be empty';
    }
    if (Object.keys(details).length > 0) {
      throw new BadRequestError('Report title and body are required', details);
    }

    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new NotFoundError('Player not found');
    }

    const now = new Date();
    const timestamp = formatTimestamp(now);
    const report: Report = {
      id: uuidv4(),
      player_id: playerId,
      title: input.title.trim(),
      report_date: input.report_date ?? formatIsoDate(now),
      creation_date: formatIsoDate(now),
      body: input.body.trim(),
      created_at: timestamp,
      updated_at: timestamp,
    };

    const reports = await this.reportRepository.findAll();
    await this.reportRepository.saveAll([...reports, report]);
    return report;
  }

  /**
   * Reports of a player, newest first
   */
  async listForPlayer(playerId: string): Promise<Report[]> {
    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new NotFoundError('Player not found');
    }

    const reports = await this.reportRepository.findByPlayerId(playerId);
    return reports.sort(compareReportsNewestFirst);
  }

  async listAll(): Promise<Report[]> {
    return this.reportRepository.findAll();
  }
}
