/**
 * Weekly Log Repository
 *
 * Data access layer for the weekly log worksheet. The worksheet shape
 * depends on the configured week convention.
 */

import { TableStore, readTable } from './table-store';
import { TableDefinition } from '../models/table';
import {
  WeeklyLogEntry,
  mapWeeklyLogRow,
  weeklyLogTable,
  weeklyLogToRecord,
} from '../models/weekly-log';
import { WeekConvention } from '../utils/week-window';

export class WeeklyLogRepository {
  private readonly table: TableDefinition;

  constructor(private store: TableStore, convention: WeekConvention = 'monday') {
    this.table = weeklyLogTable(convention);
  }

  async findAll(): Promise<WeeklyLogEntry[]> {
    return readTable(this.store, this.table, mapWeeklyLogRow);
  }

  /**
   * Entries of one player in worksheet order
   */
  async findByPlayerId(playerId: string): Promise<WeeklyLogEntry[]> {
    const entries = await this.findAll();
    return entries.filter((entry) => entry.player_id === playerId);
  }

  async saveAll(entries: WeeklyLogEntry[]): Promise<void> {
    await this.store.save(this.table, entries.map(weeklyLogToRecord));
  }
}
