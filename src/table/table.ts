/**
 * Tabular content shared by every engine component.
 *
 * A Table is what the tabular I/O provider reads and writes: an ordered list
 * of column names plus rows keyed by column name. Cell values are the
 * spreadsheet primitives; `null` stands for an empty cell.
 */

import { z } from "zod";

export type CellValue = string | number | boolean | null;

export type Row = Readonly<Record<string, CellValue>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/**
 * Blank means "no value": missing, null, or whitespace-only text.
 */
export function isBlank(value: CellValue | undefined): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  return typeof value === "string" && value.trim() === "";
}

export function cellsEqual(a: CellValue | undefined, b: CellValue | undefined): boolean {
  if (isBlank(a) && isBlank(b)) {
    return true;
  }
  return a === b;
}

/**
 * Deep copy so stored artifacts never share rows with callers.
 */
export function cloneTable(table: Table): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  };
}

export function tablesEqual(a: Table, b: Table): boolean {
  if (a.columns.length !== b.columns.length || a.rows.length !== b.rows.length) {
    return false;
  }
  if (a.columns.some((column, i) => column !== b.columns[i])) {
    return false;
  }
  return a.rows.every((row, i) => {
    const other = b.rows[i];
    return (
      other !== undefined &&
      a.columns.every((column) => (row[column] ?? null) === (other[column] ?? null))
    );
  });
}

/**
 * Stable string for a (possibly composite) row key.
 */
export function rowKeyOf(row: Row, keyColumns: readonly string[]): string {
  return JSON.stringify(keyColumns.map((column) => row[column] ?? null));
}

/**
 * Human-readable row key for messages and warnings ("Task7", "A|3").
 */
export function displayRowKey(row: Row, keyColumns: readonly string[]): string {
  return keyColumns.map((column) => String(row[column] ?? "")).join("|");
}

const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Shape check for tables read back from storage.
 */
export const TableSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(z.record(z.string(), CellValueSchema)),
  })
  .strict();
