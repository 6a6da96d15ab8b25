import type { Cell, RawRow, RawTable, Table } from "./types.js";

export const emptyTable = (): Table => ({ columns: [], rows: [] });

export function isTable(v: RawTable | Table): v is Table {
  return !Array.isArray(v);
}

/**
 * Build a column-ordered table from row objects. Columns are the union of row keys in
 * first-seen order; keys absent from a row become `null`.
 */
export function fromRawTable(raw: RawTable): Table {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of raw) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  const rows = raw.map((row) => columns.map((c) => row[c] ?? null));
  return { columns, rows };
}

export function toRawTable(table: Table): RawTable {
  return table.rows.map((row) => {
    const out: RawRow = {};
    table.columns.forEach((c, i) => {
      out[c] = row[i] ?? null;
    });
    return out;
  });
}

export const columnCells = (table: Table, index: number): Cell[] => table.rows.map((r) => r[index] ?? null);

/** Numeric when every non-missing cell is a number (an all-missing column counts as numeric). */
export function isNumericColumn(table: Table, index: number): boolean {
  return table.rows.every((r) => {
    const v = r[index];
    return v === null || v === undefined || typeof v === "number";
  });
}

/** Stable key for whole-row equality. */
export const rowKey = (row: readonly Cell[]): string => JSON.stringify(row);
