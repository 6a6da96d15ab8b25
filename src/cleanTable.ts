import { normalizeLabels, isNumericLabel } from "./semantics.js";
import { coerceNumeric, isBlank, isMissing, roundHalfEven, timestampKey, wrapPhaseAngle } from "./sanitize.js";
import { emptyTable, fromRawTable, isNumericColumn, isTable, rowKey } from "./table.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Cell, GapFillStrategy, RawTable, Table } from "./types.js";

/**
 * Module: Table Normalizer
 * Purpose: Turn a raw meter extract into a `NormalizedTable`: unique lower-case labels,
 * no empty rows/columns, numeric value columns, filled gaps, no duplicate rows and the
 * per-file-type validity rules.
 * Design:
 * - Every stage is a pure `(Table) -> Table` function and is exported for testing.
 * - Stage order is fixed; gap filling runs before duplicate removal on purpose, so
 *   rows that only differ by a gap collapse once filled.
 * - A final re-check re-runs pruning and duplicate removal, which keeps the output
 *   free of empty columns after coercion and makes `cleanTable` idempotent.
 * - Never throws on data-quality problems; unparseable cells become `null`.
 */

export interface CleanOptions {
  logger?: Logger;
}

export const DEFAULT_GAP_FILL_STRATEGY: GapFillStrategy = "linear_interpolation";

export function cleanTable(
  input: RawTable | Table | null | undefined,
  fileType: string,
  strategy: GapFillStrategy = DEFAULT_GAP_FILL_STRATEGY,
  options?: CleanOptions
): Table {
  if (!input) return emptyTable();
  const table = isTable(input) ? input : fromRawTable(input);
  if (table.rows.length === 0 || table.columns.length === 0) return emptyTable();

  const logger = options?.logger ?? silentLogger;
  let t = normalizeColumnLabels(table);
  t = pruneEmpty(t);
  t = coerceNumericColumns(t, fileType);
  t = fillGaps(t, strategy);
  t = dropDuplicateRows(t);
  t = applyFileTypeRules(t, fileType, logger);
  t = pruneEmpty(t);
  return dropDuplicateRows(t);
}

/** Keep only the columns at `keep`, in order. */
const selectColumns = (table: Table, keep: number[]): Table => ({
  columns: keep.map((i) => table.columns[i]),
  rows: table.rows.map((r) => keep.map((i) => r[i] ?? null)),
});

const filterRows = (table: Table, pred: (row: readonly Cell[]) => boolean): Table => ({
  columns: table.columns,
  rows: table.rows.filter(pred),
});

const mapColumn = (table: Table, index: number, fn: (v: Cell) => Cell): Table => ({
  columns: table.columns,
  rows: table.rows.map((r) => r.map((v, i) => (i === index ? fn(v) : v))),
});

const columnIndexes = (table: Table, pred: (label: string, index: number) => boolean): number[] =>
  table.columns.flatMap((label, i) => (pred(label, i) ? [i] : []));

export function normalizeColumnLabels(table: Table): Table {
  const labels = normalizeLabels(table.columns);
  const keep = columnIndexes(table, (_, i) => labels[i] !== undefined);
  const projected = selectColumns(table, keep);
  return { columns: keep.map((i) => labels[i] ?? ""), rows: projected.rows };
}

export function pruneEmpty(table: Table): Table {
  const keep = columnIndexes(table, (_, i) => table.rows.some((r) => !isBlank(r[i])));
  const pruned = selectColumns(table, keep);
  return filterRows(pruned, (row) => row.some((v) => !isBlank(v)));
}

export function coerceNumericColumns(table: Table, fileType: string): Table {
  const numeric = new Set(columnIndexes(table, (label) => isNumericLabel(label, fileType)));
  if (numeric.size === 0) return table;
  return {
    columns: table.columns,
    rows: table.rows.map((r) => r.map((v, i) => (numeric.has(i) ? coerceNumeric(v) : v))),
  };
}

/**
 * Interior gaps are interpolated by row position, trailing gaps repeat the last value,
 * leading gaps stay missing.
 */
export function interpolateLinear(values: readonly Cell[]): Cell[] {
  const out = [...values];
  let prev = -1;
  for (let i = 0; i < out.length; i++) {
    const v = out[i];
    if (typeof v !== "number") continue;
    if (prev >= 0 && i - prev > 1) {
      const start = out[prev];
      if (typeof start === "number") {
        const step = (v - start) / (i - prev);
        for (let k = prev + 1; k < i; k++) out[k] = start + step * (k - prev);
      }
    }
    prev = i;
  }
  if (prev >= 0) {
    const last = out[prev];
    for (let k = prev + 1; k < out.length; k++) out[k] = last;
  }
  return out;
}

const fillDirectional = (table: Table, direction: "forward" | "backward"): Table => {
  const rows = table.rows.map((r) => [...r]);
  const order = direction === "forward" ? rows : [...rows].reverse();
  table.columns.forEach((_, c) => {
    let carry: Cell = null;
    for (const row of order) {
      if (isMissing(row[c])) row[c] = carry;
      else carry = row[c];
    }
  });
  return { columns: table.columns, rows };
};

export function fillGaps(table: Table, strategy: GapFillStrategy): Table {
  switch (strategy) {
    case "linear_interpolation": {
      const numeric = columnIndexes(table, (_, i) => isNumericColumn(table, i));
      const rows = table.rows.map((r) => [...r]);
      for (const c of numeric) {
        const filled = interpolateLinear(rows.map((r) => r[c] ?? null));
        filled.forEach((v, i) => {
          rows[i][c] = v;
        });
      }
      return { columns: table.columns, rows };
    }
    case "forward_fill":
      return fillDirectional(table, "forward");
    case "backward_fill":
      return fillDirectional(table, "backward");
    case "remove":
      return filterRows(table, (row) => row.every((v) => !isMissing(v)));
  }
}

export function dropDuplicateRows(table: Table): Table {
  const seen = new Set<string>();
  return filterRows(table, (row) => {
    const key = rowKey(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Stable chronological sort on column `index`. Rows without a parseable key follow the
 * keyed rows in their original order. Returns the input when nothing parses.
 */
export function sortByTimestamp(table: Table, index: number): Table {
  const keyed = table.rows.map((row, pos) => ({ row, pos, key: timestampKey(row[index]) }));
  if (keyed.every((k) => k.key === null)) return table;
  keyed.sort((a, b) => {
    if (a.key === null && b.key === null) return a.pos - b.pos;
    if (a.key === null) return 1;
    if (b.key === null) return -1;
    return a.key - b.key || a.pos - b.pos;
  });
  return { columns: table.columns, rows: keyed.map((k) => k.row) };
}

const numericColumnsMatching = (table: Table, tokens: readonly string[]): number[] =>
  columnIndexes(table, (label, i) => tokens.some((t) => label.includes(t)) && isNumericColumn(table, i));

const dropRowsWhere = (table: Table, cols: number[], bad: (n: number) => boolean): Table =>
  cols.length === 0
    ? table
    : filterRows(table, (row) => cols.every((c) => {
        const v = row[c];
        return typeof v !== "number" || !bad(v);
      }));

function cleanTrend(table: Table, logger: Logger): Table {
  let t = table;
  const tsIndex = t.columns.findIndex((c) => c.includes("time") || c.includes("date"));
  if (tsIndex >= 0) {
    const sorted = sortByTimestamp(t, tsIndex);
    if (sorted === t) logger.debug(`no parseable timestamps in "${t.columns[tsIndex]}", row order unchanged`);
    t = sorted;
  }
  // AC RMS readings are never negative
  return dropRowsWhere(t, numericColumnsMatching(t, ["volt"]), (v) => v < 0);
}

/** Non-positive harmonic orders are dropped; the rest are rounded to integers. */
function enforceHarmonicOrders(table: Table): Table {
  let t = table;
  for (const c of numericColumnsMatching(t, ["harmonic"])) {
    t = dropRowsWhere(t, [c], (v) => v <= 0);
    t = mapColumn(t, c, (v) => (typeof v === "number" ? roundHalfEven(v) : v));
  }
  return t;
}

function wrapPhaseColumns(table: Table): Table {
  let t = table;
  for (const c of numericColumnsMatching(t, ["phase", "angle"])) {
    t = mapColumn(t, c, (v) => (typeof v === "number" ? wrapPhaseAngle(v) : v));
  }
  return t;
}

export function applyFileTypeRules(table: Table, fileType: string, logger: Logger = silentLogger): Table {
  switch (fileType) {
    case "tendencia":
      return cleanTrend(table, logger);
    case "armonicos_potencia":
      return wrapPhaseColumns(enforceHarmonicOrders(table));
    case "armonicos_voltaje": {
      const t = enforceHarmonicOrders(table);
      return wrapPhaseColumns(dropRowsWhere(t, numericColumnsMatching(t, ["amplitude", "magnitude"]), (v) => v < 0));
    }
    default:
      return table;
  }
}
