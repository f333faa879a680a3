/**
 * Table Models
 *
 * Shared definitions for the flat worksheets backing the application.
 * Every worksheet is a header row followed by data rows of strings.
 */

/**
 * Calendar date in ISO form (YYYY-MM-DD)
 */
export type IsoDate = string;

/**
 * Local timestamp (YYYY-MM-DD HH:mm:ss), as written to the audit columns
 */
export type Timestamp = string;

/**
 * Worksheet name plus its required ordered header
 */
export interface TableDefinition {
  name: string;
  columns: readonly string[];
}

/**
 * Raw worksheet contents: header row first
 */
export type TableValues = string[][];

/**
 * Names of the persisted worksheets
 */
export enum TableName {
  PLAYERS = 'jugadores',
  WEEKLY_LOG = 'seguimiento',
  REPORTS = 'reportes',
}

export function isTableName(value: string): value is TableName {
  return Object.values<string>(TableName).includes(value);
}
