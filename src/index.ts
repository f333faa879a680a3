/**
 * Loan Tracker Backend
 *
 * Main entry point for the Lambda function.
 */

export { handler, createApiHandler, buildServices, getServices } from './handlers/api-handler';
export type { Services } from './handlers/api-handler';
export * from './config/environment';
export { openSpreadsheet, GoogleSheetsClient } from './config/spreadsheet';
export type { SheetClient } from './config/spreadsheet';
export { TableStore } from './repositories/table-store';
export * from './utils/week-window';
export { reconcileTable } from './utils/schema-reconciler';
export { parseDateSafe, parseIntSafe, parseBoolSafe, decodeRows } from './utils/row-normalizer';
export * from './utils/roster-operations';
export * from './utils/weekly-log-operations';
export * from './utils/player-aggregation';
export * from './models/errors';
