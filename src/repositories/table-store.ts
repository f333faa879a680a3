/**
 * Table Store
 *
 * Reads and writes whole worksheets through a SheetClient.
 *
 * - A missing worksheet is created with the required header
 * - A drifted header is reconciled and written back before use
 * - Reads are cached per worksheet for cacheTtlMs; any save clears the cache
 * - Every client failure surfaces as SpreadsheetConnectionError
 */

import { SheetClient } from '../config/spreadsheet';
import { TableDefinition, TableValues } from '../models/table';
import { SpreadsheetConnectionError } from '../models/errors';
import { reconcileTable, toOrderedRows } from '../utils/schema-reconciler';
import { LogLevel, log, logSpreadsheet } from '../utils/logger';
import { RowReader, decodeRows } from '../utils/row-normalizer';
import { measureSheetWrite } from '../utils/metrics';

const NEW_WORKSHEET_ROWS = 1000;
const MIN_WORKSHEET_COLUMNS = 20;

export interface TableStoreOptions {
  cacheTtlMs: number;
}

interface CacheEntry {
  values: TableValues;
  loadedAt: number;
}

export class TableStore {
  private readonly cache = new Map<string, CacheEntry>();
  private worksheets: Promise<Set<string>> | null = null;

  constructor(
    private readonly client: SheetClient,
    private readonly options: TableStoreOptions
  ) {}

  /**
   * Values of a worksheet, header row first, aligned with the definition
   */
  async load(definition: TableDefinition): Promise<TableValues> {
    const cached = this.cache.get(definition.name);
    if (cached && Date.now() - cached.loadedAt < this.options.cacheTtlMs) {
      return cached.values;
    }

    await this.ensureWorksheet(definition);

    const raw = await this.call('READ', definition.name, () => this.client.readValues(definition.name));
    const { values, rewrite } = reconcileTable(definition.columns, raw);

    if (rewrite) {
      await this.write(definition.name, values);
    }

    this.cache.set(definition.name, { values, loadedAt: Date.now() });
    return values;
  }

  /**
   * Overwrite a worksheet with the given records in the definition's column order
   */
  async save(definition: TableDefinition, records: Record<string, string>[]): Promise<void> {
    await this.ensureWorksheet(definition);

    const values = [[...definition.columns], ...toOrderedRows(definition.columns, records)];
    try {
      await this.write(definition.name, values);
    } finally {
      this.invalidate();
    }
  }

  /**
   * Drop every cached read
   */
  invalidate(): void {
    this.cache.clear();
  }

  private async ensureWorksheet(definition: TableDefinition): Promise<void> {
    const worksheets = await this.worksheetTitles();
    if (worksheets.has(definition.name)) {
      return;
    }

    await this.call('CREATE', definition.name, () =>
      this.client.addWorksheet(
        definition.name,
        NEW_WORKSHEET_ROWS,
        Math.max(MIN_WORKSHEET_COLUMNS, definition.columns.length)
      )
    );
    worksheets.add(definition.name);
  }

  /**
   * Worksheet titles, fetched once and shared by concurrent loads
   */
  private async worksheetTitles(): Promise<Set<string>> {
    if (this.worksheets) {
      return this.worksheets;
    }

    const pending = this.call('LIST', '*', () => this.client.listWorksheets())
      .then((titles) => new Set(titles));
    this.worksheets = pending;

    try {
      return await pending;
    } catch (error) {
      this.worksheets = null;
      throw error;
    }
  }

  private write(worksheet: string, values: TableValues): Promise<void> {
    return this.call('WRITE', worksheet, () =>
      measureSheetWrite(worksheet, () => this.client.overwriteValues(worksheet, values))
    );
  }

  private async call<T>(operation: string, worksheet: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof SpreadsheetConnectionError) {
        throw error;
      }

      const detail = error instanceof Error ? error.message : String(error);
      logSpreadsheet({ errorMessage: detail, worksheet, operation });

      throw new SpreadsheetConnectionError(
        `Spreadsheet ${operation.toLowerCase()} failed for worksheet ${worksheet}`,
        ['that the spreadsheet is still shared with the service account', 'the Google Sheets API quota'],
        detail
      );
    }
  }
}

/**
 * Load and decode a worksheet, logging any cells that fell back to defaults
 */
export async function readTable<T>(
  store: TableStore,
  definition: TableDefinition,
  decode: (reader: RowReader) => T
): Promise<T[]> {
  const { rows, issues } = decodeRows(await store.load(definition), decode);

  if (issues.length > 0) {
    log(LogLevel.WARN, 'Cells defaulted while decoding', {
      worksheet: definition.name,
      issues: issues.length,
      cells: issues.map((issue) => ({ row: issue.row, column: issue.column, reason: issue.reason })),
    });
  }

  return rows;
}
