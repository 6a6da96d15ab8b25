import type { RawRow, RawTable } from "./types.js";

export type Delimiter = "," | ";" | "\t" | "|";

const DELIMITERS: Delimiter[] = [",", ";", "\t", "|"];

/**
 * parseDsvRaw
 * Delimiter-separated values into array-of-arrays using a state machine that handles
 * quoted fields, escaped quotes and delimiters inside quotes. CR is ignored.
 */
export function parseDsvRaw(text: string, delim: Delimiter): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else {
      if (c === `"`) {
        inQuotes = true;
      } else if (c === delim) {
        pushField();
      } else if (c === "\n") {
        pushField();
        pushRow();
      } else if (c === "\r") {
        // ignore CR
      } else {
        field += c;
      }
    }
  }
  pushField();
  pushRow();
  // Trim possible trailing empty last row
  if (rows.length && rows[rows.length - 1].every((v) => v === "")) rows.pop();
  return rows;
}

/**
 * detectDelimiterFromText
 * Picks the delimiter whose column count is most stable (and greater than one) over the
 * first lines. Meter exports in comma-decimal locales use `;`.
 */
export function detectDelimiterFromText(text: string): Delimiter {
  const lines = text.split(/\r?\n/).filter((l) => l.trim() !== "").slice(0, 40);
  let best: { delim: Delimiter; score: number } = { delim: ",", score: -1 };
  for (const delim of DELIMITERS) {
    const counts = lines.map((l) => l.split(delim).length);
    const widest = Math.max(0, ...counts);
    if (widest <= 1) continue;
    const stable = counts.filter((n) => n === widest).length;
    const score = stable * widest;
    if (score > best.score) best = { delim, score };
  }
  return best.delim;
}

/** Make header labels unique the way SheetJS does: `Name`, `Name_1`, `Name_2`. */
function uniqueHeaders(headers: string[]): string[] {
  const seen = new Set<string>();
  return headers.map((h) => {
    let label = h;
    for (let n = 1; seen.has(label); n++) label = `${h}_${n}`;
    seen.add(label);
    return label;
  });
}

export interface CsvReadOptions {
  headerRow?: number;
  delimiter?: Delimiter;
}

/**
 * Parse CSV/DSV text into row objects. The line at `headerRow` (zero-based, default 0)
 * holds the labels; lines above it are the export preamble and are skipped.
 * Empty fields become `null`; values stay strings for the normalizer to coerce.
 */
export function parseCsvToRows(text: string, options?: CsvReadOptions): RawTable {
  const delim = options?.delimiter ?? detectDelimiterFromText(text);
  const headerRow = options?.headerRow ?? 0;
  const rows = parseDsvRaw(text, delim);
  if (rows.length <= headerRow) return [];

  const headers = uniqueHeaders(rows[headerRow].map((h) => String(h ?? "").trim()));
  const out: RawTable = [];
  for (let r = headerRow + 1; r < rows.length; r++) {
    const rowVals = rows[r];
    const obj: RawRow = {};
    headers.forEach((h, idx) => {
      const v = rowVals[idx];
      obj[h] = v === undefined || v === "" ? null : v;
    });
    out.push(obj);
  }
  return out;
}
