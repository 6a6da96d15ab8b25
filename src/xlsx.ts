import * as XLSX from "xlsx";
import type { Cell, RawRow, RawTable } from "./types.js";

export interface WorkbookReadOptions {
  headerRow?: number;
  sheetName?: string;
}

/** Meter exports put the column labels on sheet row 17 below a fixed preamble. */
export const DEFAULT_HEADER_ROW = 16;

const toCell = (v: unknown): Cell => {
  if (v === undefined || v === null) return null;
  if (typeof v === "number" || typeof v === "string") return v;
  if (v instanceof Date) return v.toISOString();
  return String(v);
};

/**
 * Read a workbook (XLSX/XLS/ODS) from `ArrayBuffer` into row objects.
 * - Uses `sheetName` when present, otherwise the first sheet.
 * - Labels come from `headerRow` (zero-based); blank cells become `null`.
 * - Dates stay sheet serial numbers, which order chronologically.
 * Throws when the bytes are not a workbook or the sheet does not exist.
 */
export function readWorkbookToTable(fileBytes: ArrayBuffer, options?: WorkbookReadOptions): RawTable {
  const workbook = XLSX.read(new Uint8Array(fileBytes), { type: "array" });
  const sheetName = chooseSheet(workbook.SheetNames, options?.sheetName);
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new Error(options?.sheetName ? `sheet "${options.sheetName}" not found` : "workbook has no sheets");

  const json = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    range: options?.headerRow ?? DEFAULT_HEADER_ROW,
    defval: null,
    raw: true,
  });
  return json.map((row) => {
    const out: RawRow = {};
    for (const key of Object.keys(row)) {
      out[key] = toCell(row[key]);
    }
    return out;
  });
}

function chooseSheet(sheetNames: string[], preferred?: string): string | undefined {
  if (preferred) return sheetNames.find((name) => name === preferred);
  return sheetNames[0];
}
