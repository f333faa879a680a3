/**
 * Schema Reconciler
 *
 * Aligns a worksheet's header with the required column list. Values under
 * column names present in both headers are preserved; missing columns are
 * filled with empty strings; columns no longer required are dropped.
 */

import { TableValues } from '../models/table';

export interface ReconcileResult {
  values: TableValues;
  rewrite: boolean;    // worksheet must be overwritten with `values`
}

function sameHeader(header: readonly string[], required: readonly string[]): boolean {
  return header.length === required.length && header.every((column, i) => column === required[i]);
}

/**
 * Reconcile worksheet values (header row first) against the required columns
 */
export function reconcileTable(
  required: readonly string[],
  values: TableValues
): ReconcileResult {
  if (values.length === 0) {
    return { values: [[...required]], rewrite: true };
  }

  const [header, ...data] = values;
  if (sameHeader(header, required)) {
    return { values, rewrite: false };
  }

  const rows = data.map((cells) => {
    const byName = new Map<string, string>();
    header.forEach((column, i) => {
      // first occurrence wins when a header repeats a name
      if (!byName.has(column)) {
        byName.set(column, cells[i] ?? '');
      }
    });
    return required.map((column) => byName.get(column) ?? '');
  });

  return { values: [[...required], ...rows], rewrite: true };
}

/**
 * Project rows keyed by column name onto the required column order
 */
export function toOrderedRows(
  required: readonly string[],
  records: Record<string, string>[]
): string[][] {
  return records.map((record) => required.map((column) => record[column] ?? ''));
}
