/**
 * Player Repository
 *
 * Data access layer for the players worksheet.
 */

import { TableStore, readTable } from './table-store';
import { PLAYER_TABLE, Player, mapPlayerRow, playerToRecord } from '../models/player';

export class PlayerRepository {
  constructor(private store: TableStore) {}

  /**
   * Every player in worksheet order
   */
  async findAll(): Promise<Player[]> {
    return readTable(this.store, PLAYER_TABLE, mapPlayerRow);
  }

  /**
   * Find a player by ID
   *
   * @returns Player if found, null otherwise
   */
  async findById(playerId: string): Promise<Player | null> {
    const players = await this.findAll();
    return players.find((p) => p.id === playerId) ?? null;
  }

  /**
   * Replace the worksheet contents with the given players
   */
  async saveAll(players: Player[]): Promise<void> {
    await this.store.save(PLAYER_TABLE, players.map(playerToRecord));
  }
}
