/**
 * Row Normalizer
 *
 * Converts the untyped string cells read from a worksheet into typed values.
 * Malformed cells never throw: they fall back to a default (null date, zero,
 * false) and the fallback is reported as a CellIssue so callers can log it.
 *
 * Accepted date inputs:
 * - native Date objects
 * - YYYY-MM-DD, DD/MM/YYYY, DD-MM-YYYY (four-digit years only)
 * - "March 4, 2024" and "Mar 4, 2024"
 * - ISO date-times, read as local time
 *
 * Days that do not exist in their month (2024-02-30) are unparseable, never
 * rolled over. Empty strings, "nat" and "none" are treated as "no date" and
 * are not issues.
 */

import { format, isValid, parse, parseISO } from 'date-fns';
import { IsoDate, TableValues, Timestamp } from '../models/table';

// each pattern only runs on text of its own shape
const DATE_PATTERNS: ReadonlyArray<{ shape: RegExp; pattern: string }> = [
  { shape: /^\d{4}-\d{1,2}-\d{1,2}$/, pattern: 'yyyy-MM-dd' },
  { shape: /^\d{1,2}\/\d{1,2}\/\d{4}$/, pattern: 'dd/MM/yyyy' },
  { shape: /^\d{1,2}-\d{1,2}-\d{4}$/, pattern: 'dd-MM-yyyy' },
  { shape: /^[A-Za-z]{4,} \d{1,2}, \d{4}$/, pattern: 'MMMM d, yyyy' },
  { shape: /^[A-Za-z]{3} \d{1,2}, \d{4}$/, pattern: 'MMM d, yyyy' },
];

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

const EMPTY_DATE_MARKERS = ['', 'nat', 'none'];

const TRUE_VALUES = ['true', '1', 'si', 'sí'];
const FALSE_VALUES = ['false', '0', 'no'];

/**
 * A cell that could not be decoded and was replaced by its default
 */
export interface CellIssue {
  row: number;        // 1-based worksheet row, header included
  column: string;
  raw: string;
  reason: string;
}

/**
 * Rows decoded from a worksheet plus every cell that fell back to a default
 */
export interface DecodeResult<T> {
  rows: T[];
  issues: CellIssue[];
}

/**
 * Format a Date as an ISO calendar date (local time)
 */
export function formatIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a date cell, returning null for empty or unparseable input
 */
export function parseDateSafe(value: unknown): IsoDate | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return isValid(value) ? formatIsoDate(value) : null;
  }

  const text = String(value).trim();
  if (EMPTY_DATE_MARKERS.includes(text.toLowerCase())) {
    return null;
  }

  const reference = new Date(2000, 0, 1);
  for (const { shape, pattern } of DATE_PATTERNS) {
    if (!shape.test(text)) {
      continue;
    }
    const parsed = parse(text, pattern, reference);
    if (isValid(parsed)) {
      return formatIsoDate(parsed);
    }
  }

  if (ISO_DATE_TIME.test(text)) {
    const parsed = parseISO(text);
    return isValid(parsed) ? formatIsoDate(parsed) : null;
  }

  return null;
}

/**
 * Parse an integer cell; anything unparseable becomes 0.
 * Decimal input is truncated ("3.0" -> 3).
 */
export function parseIntSafe(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }

  if (typeof value !== 'string') {
    return 0;
  }

  const text = value.trim();
  if (text === '') {
    return 0;
  }

  const parsed = Number(text);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
}

/**
 * Parse a boolean-like cell; anything unrecognized becomes false
 */
export function parseBoolSafe(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  const text = String(value ?? '').trim().toLowerCase();
  return TRUE_VALUES.includes(text);
}

function isRecognizedBool(text: string): boolean {
  const normalized = text.trim().toLowerCase();
  return TRUE_VALUES.includes(normalized) || FALSE_VALUES.includes(normalized);
}

/**
 * Reads typed values out of one worksheet row by column name.
 * Columns missing from the header read as empty cells.
 */
export class RowReader {
  readonly issues: CellIssue[] = [];

  constructor(
    private readonly header: readonly string[],
    private readonly cells: readonly string[],
    private readonly rowNumber: number
  ) {}

  text(column: string): string {
    const index = this.header.indexOf(column);
    if (index < 0) {
      return '';
    }
    return this.cells[index] ?? '';
  }

  date(column: string): IsoDate | null {
    const raw = this.text(column);
    const parsed = parseDateSafe(raw);
    if (parsed === null && !EMPTY_DATE_MARKERS.includes(raw.trim().toLowerCase())) {
      this.report(column, raw, 'unparseable date');
    }
    return parsed;
  }

  int(column: string): number {
    const raw = this.text(column);
    if (raw.trim() !== '' && !Number.isFinite(Number(raw.trim()))) {
      this.report(column, raw, 'not a number');
    }
    return parseIntSafe(raw);
  }

  bool(column: string): boolean {
    const raw = this.text(column);
    if (raw.trim() !== '' && !isRecognizedBool(raw)) {
      this.report(column, raw, 'not a boolean');
    }
    return parseBoolSafe(raw);
  }

  report(column: string, raw: string, reason: string): void {
    this.issues.push({ row: this.rowNumber, column, raw, reason });
  }
}

/**
 * Decode every data row of a worksheet (header row first)
 */
export function decodeRows<T>(
  values: TableValues,
  decode: (reader: RowReader) => T
): DecodeResult<T> {
  if (values.length === 0) {
    return { rows: [], issues: [] };
  }

  const [header, ...data] = values;
  const rows: T[] = [];
  const issues: CellIssue[] = [];

  data.forEach((cells, index) => {
    const reader = new RowReader(header, cells, index + 2);
    rows.push(decode(reader));
    issues.push(...reader.issues);
  });

  return { rows, issues };
}

/**
 * Encode typed values back into worksheet cells
 */
export function encodeDate(value: IsoDate | null): string {
  return value ?? '';
}

export function encodeBool(value: boolean): string {
  return value ? 'TRUE' : 'FALSE';
}

export function encodeInt(value: number): string {
  return String(Math.trunc(value));
}

/**
 * Audit timestamp as written to created_at / updated_at
 */
export function formatTimestamp(date: Date = new Date()): Timestamp {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}
