/**
 * Export Service
 *
 * CSV dumps of single tables and an Excel workbook holding every table twice:
 * as stored, and with human labels for reading.
 */

import * as Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { PlayerRepository } from '../repositories/player-repository';
import { WeeklyLogRepository } from '../repositories/weekly-log-repository';
import { ReportRepository } from '../repositories/report-repository';
import { PLAYER_TABLE, Player, playerToRecord } from '../models/player';
import { WeeklyLogEntry, weeklyLogTable, weeklyLogToRecord } from '../models/weekly-log';
import { REPORT_TABLE, Report, reportToRecord } from '../models/report';
import { TableDefinition, TableName } from '../models/table';
import { WeekConvention } from '../utils/week-window';
import { toOrderedRows } from '../utils/schema-reconciler';

type Cell = string | number;

interface ExportTables {
  players: Player[];
  weeklyLog: WeeklyLogEntry[];
  reports: Report[];
}

function yesNo(value: boolean): string {
  return value ? 'Sí' : 'No';
}

function prettyPlayers(players: Player[]): Cell[][] {
  return [
    [
      'Nombre', 'Puesto', 'Fecha de nacimiento', 'País', 'División', 'Club',
      'Opción de compra', 'Opción de repesca', 'Fecha de retorno', 'Fin de contrato',
      'Estado', 'Observaciones',
    ],
    ...players.map((p) => [
      p.name, p.position, p.birth_date ?? '', p.loan_country, p.loan_division, p.loan_club,
      yesNo(p.buy_option), yesNo(p.buy_back), p.return_date ?? '', p.contract_end ?? '',
      p.status, p.notes,
    ]),
  ];
}

function prettyWeeklyLog(entries: WeeklyLogEntry[], names: Map<string, string>): Cell[][] {
  return [
    [
      'Jugador', 'Semana desde', 'Semana hasta', 'Partidos', 'Minutos', 'Goles marcados',
      'Goles encajados', 'Amarillas', 'Rojas', 'Incidencias',
    ],
    ...entries.map((e) => [
      names.get(e.player_id) ?? e.player_id, e.week_start ?? '', e.week_end ?? '',
      e.matches, e.minutes, e.goals_scored, e.goals_conceded, e.yellow_cards, e.red_cards,
      e.incidents,
    ]),
  ];
}

function prettyReports(reports: Report[], names: Map<string, string>): Cell[][] {
  return [
    ['Jugador', 'Título', 'Fecha del reporte', 'Fecha de creación', 'Contenido'],
    ...reports.map((r) => [
      names.get(r.player_id) ?? r.player_id, r.title, r.report_date ?? '', r.creation_date ?? '', r.body,
    ]),
  ];
}

export class ExportService {
  private readonly weeklyLogDefinition: TableDefinition;

  constructor(
    private playerRepository: PlayerRepository,
    private weeklyLogRepository: WeeklyLogRepository,
    private reportRepository: ReportRepository,
    convention: WeekConvention = 'monday'
  ) {
    this.weeklyLogDefinition = weeklyLogTable(convention);
  }

  /**
   * One table as CSV text, header first
   */
  async exportCsv(table: TableName): Promise<string> {
    const [definition, records] = this.toRecords(table, await this.loadTables());

    return Papa.unparse({
      fields: [...definition.columns],
      data: toOrderedRows(definition.columns, records),
    });
  }

  /**
   * Every table as an .xlsx workbook: raw sheets named after the tables,
   * then a labelled sheet per table with player names resolved
   */
  async exportWorkbook(): Promise<Buffer> {
    const tables = await this.loadTables();
    const names = new Map(tables.players.map((p) => [p.id, p.name]));
    const workbook = XLSX.utils.book_new();

    for (const table of Object.values(TableName)) {
      const [definition, records] = this.toRecords(table, tables);
      const sheet = XLSX.utils.aoa_to_sheet([
        [...definition.columns],
        ...toOrderedRows(definition.columns, records),
      ]);
      XLSX.utils.book_append_sheet(workbook, sheet, definition.name);
    }

    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(prettyPlayers(tables.players)), 'Jugadores (vista)');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(prettyWeeklyLog(tables.weeklyLog, names)), 'Seguimiento (vista)');
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(prettyReports(tables.reports, names)), 'Reportes (vista)');

    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return buffer;
  }

  private async loadTables(): Promise<ExportTables> {
    const [players, weeklyLog, reports] = await Promise.all([
      this.playerRepository.findAll(),
      this.weeklyLogRepository.findAll(),
      this.reportRepository.findAll(),
    ]);
    return { players, weeklyLog, reports };
  }

  private toRecords(table: TableName, tables: ExportTables): [TableDefinition, Record<string, string>[]] {
    switch (table) {
      case TableName.PLAYERS:
        return [PLAYER_TABLE, tables.players.map(playerToRecord)];
      case TableName.WEEKLY_LOG:
        return [this.weeklyLogDefinition, tables.weeklyLog.map(weeklyLogToRecord)];
      case TableName.REPORTS:
        return [REPORT_TABLE, tables.reports.map(reportToRecord)];
    }
  }
}
