/**
 * Report Repository
 *
 * Data access layer for the reports worksheet.
 */

import { TableStore, readTable } from './table-store';
import { REPORT_TABLE, Report, mapReportRow, reportToRecord } from '../models/report';

export class ReportRepository {
  constructor(private store: TableStore) {}

  async findAll(): Promise<Report[]> {
    return readTable(this.store, REPORT_TABLE, mapReportRow);
  }

  async findByPlayerId(playerId: string): Promise<Report[]> {
    const reports = await this.findAll();
    return reports.filter((report) => report.player_id === playerId);
  }

  async saveAll(reports: Report[]): Promise<void> {
    await this.store.save(REPORT_TABLE, reports.map(reportToRecord));
  }
}
