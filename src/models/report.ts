/**
 * Report Models
 *
 * Free-text dated notes attached to a player. Reports are never edited.
 */

import { IsoDate, TableDefinition, TableName, Timestamp } from './table';
import { RowReader, encodeDate } from '../utils/row-normalizer';

export interface Report {
  id: string;                    // UUID
  player_id: string;
  title: string;
  report_date: IsoDate | null;   // date the report refers to
  creation_date: IsoDate | null; // date it was written
  body: string;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export const REPORT_TABLE: TableDefinition = {
  name: TableName.REPORTS,
  columns: [
    'reporte_id',
    'jugador_id',
    'titulo',
    'fecha_reporte',
    'fecha_creacion',
    'contenido',
    'created_at',
    'updated_at',
  ],
};

export function mapReportRow(row: RowReader): Report {
  return {
    id: row.text('reporte_id'),
    player_id: row.text('jugador_id'),
    title: row.text('titulo'),
    report_date: row.date('fecha_reporte'),
    creation_date: row.date('fecha_creacion'),
    body: row.text('contenido'),
    created_at: row.text('created_at'),
    updated_at: row.text('updated_at'),
  };
}

export function reportToRecord(report: Report): Record<string, string> {
  return {
    reporte_id: report.id,
    jugador_id: report.player_id,
    titulo: report.title,
    fecha_reporte: encodeDate(report.report_date),
    fecha_creacion: encodeDate(report.creation_date),
    contenido: report.body,
    created_at: report.created_at,
    updated_at: report.updated_at,
  };
}

/**
 * Newest report first: report date, then creation timestamp
 */
export function compareReportsNewestFirst(a: Report, b: Report): number {
  const byDate = (b.report_date ?? '').localeCompare(a.report_date ?? '');
  return byDate !== 0 ? byDate : b.created_at.localeCompare(a.created_at);
}
