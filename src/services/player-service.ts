/**
 * Player Service
 *
 * Business logic layer for the roster: listing, creation, edits,
 * termination (soft delete) and cascading removal (hard delete).
 */

import { PlayerRepository } from '../repositories/player-repository';
import { WeeklyLogRepository } from '../repositories/weekly-log-repository';
import { ReportRepository } from '../repositories/report-repository';
import { Player, PlayerFields, PlayerStatus, playerLabel } from '../models/player';
import { BadRequestError, NotFoundError } from '../models/errors';
import {
  HardDeleteResult,
  NewPlayerInput,
  buildNewPlayerFields,
  hardDeletePlayer,
  softDeletePlayer,
  upsertPlayer,
} from '../utils/roster-operations';
import { formatTimestamp } from '../utils/row-normalizer';
import { LogLevel, log } from '../utils/logger';
import { emitPlayerHardDeleted } from '../utils/metrics';

export interface PlayerListItem extends Player {
  label: string;
}

const STATUS_ORDER: PlayerStatus[] = [
  PlayerStatus.ACTIVE,
  PlayerStatus.FINISHED,
  PlayerStatus.TERMINATED,
];

function compareForList(a: Player, b: Player): number {
  const byStatus = STATUS_ORDER.indexOf(a.status) - STATUS_ORDER.indexOf(b.status);
  return byStatus !== 0 ? byStatus : a.name.localeCompare(b.name);
}

function requireName(name: string | undefined): void {
  if (name !== undefined && name.trim() === '') {
    throw new BadRequestError('Player name must not be empty', { name: 'Must not be empty' });
  }
}

export class PlayerService {
  constructor(
    private playerRepository: PlayerRepository,
    private weeklyLogRepository: WeeklyLogRepository,
    private reportRepository: ReportRepository
  ) {}

  /**
   * List players by status (Activo first) then name
   *
   * @param status - Only players in this state
   */
  async listPlayers(status?: PlayerStatus): Promise<PlayerListItem[]> {
    const players = await this.playerRepository.findAll();

    return players
      .filter((player) => !status || player.status === status)
      .sort(compareForList)
      .map((player) => ({ ...player, label: playerLabel(player) }));
  }

  /**
   * Get a player by ID with 404 handling
   *
   * @throws NotFoundError if the player doesn't exist
   */
  async getPlayer(playerId: string): Promise<Player> {
    const player = await this.playerRepository.findById(playerId);

    if (!player) {
      throw new NotFoundError('Player not found');
    }

    return player;
  }

  /**
   * Create a player, applying the creation defaults to omitted fields
   */
  async createPlayer(input: NewPlayerInput): Promise<Player> {
    requireName(input.name);

    const players = await this.playerRepository.findAll();
    const fields = buildNewPlayerFields({ ...input, name: input.name.trim() });
    const result = upsertPlayer(players, null, fields, formatTimestamp());

    await this.playerRepository.saveAll(result.players);
    return result.player;
  }

  /**
   * Apply the given fields to an existing player
   *
   * @throws NotFoundError if the player doesn't exist
   */
  async updatePlayer(playerId: string, fields: Partial<PlayerFields>): Promise<Player> {
    requireName(fields.name);

    const players = await this.playerRepository.findAll();
    if (!players.some((p) => p.id === playerId)) {
      throw new NotFoundError('Player not found');
    }

    const result = upsertPlayer(players, playerId, fields, formatTimestamp());
    await this.playerRepository.saveAll(result.players);
    return result.player;
  }

  /**
   * Mark a player as Rescindido, keeping its history
   */
  async terminatePlayer(playerId: string, reason?: string): Promise<Player> {
    const players = await this.playerRepository.findAll();
    const result = softDeletePlayer(players, playerId, reason, formatTimestamp());

    await this.playerRepository.saveAll(result.players);
    return result.player;
  }

  /**
   * Remove a player together with its weekly entries and reports
   */
  async deletePlayer(playerId: string): Promise<HardDeleteResult['removed']> {
    const [players, weeklyLog, reports] = await Promise.all([
      this.playerRepository.findAll(),
      this.weeklyLogRepository.findAll(),
      this.reportRepository.findAll(),
    ]);

    const { tables, removed } = hardDeletePlayer({ players, weeklyLog, reports }, playerId);

    if (removed.weekly_entries > 0) {
      await this.weeklyLogRepository.saveAll(tables.weeklyLog);
    }
    if (removed.reports > 0) {
      await this.reportRepository.saveAll(tables.reports);
    }
    await this.playerRepository.saveAll(tables.players);

    log(LogLevel.INFO, 'Player removed with cascade', { player_id: playerId, ...removed });
    await emitPlayerHardDeleted();

    return removed;
  }
}
