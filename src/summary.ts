import { isMissing } from "./sanitize.js";
import { columnCells, isNumericColumn, rowKey } from "./table.js";
import type { AnalysisResult, Table } from "./types.js";

export interface AnalysesSummary {
  total_files_processed: number;
  files_by_type: Record<string, number>;
  total_violations: {
    voltage_deviations: number;
    flickers: number;
    thd_exceeded: number;
    harmonics_analyzed: number;
  };
  processing_timestamp: string;
}

/**
 * Consolidate several results: channels exceeding their limit per category, and the
 * number of harmonic records analyzed.
 */
export function summarizeAnalyses(results: readonly AnalysisResult[], now: Date = new Date()): AnalysesSummary {
  const summary: AnalysesSummary = {
    total_files_processed: results.length,
    files_by_type: {},
    total_violations: { voltage_deviations: 0, flickers: 0, thd_exceeded: 0, harmonics_analyzed: 0 },
    processing_timestamp: now.toISOString(),
  };
  for (const r of results) {
    summary.files_by_type[r.fileType] = (summary.files_by_type[r.fileType] ?? 0) + 1;
    summary.total_violations.voltage_deviations += r.voltageDeviations.filter((v) => v.excede_limite).length;
    summary.total_violations.flickers += r.flickers.filter((f) => f.excede_limite).length;
    summary.total_violations.thd_exceeded += r.thdAnalysis.filter((t) => t.excede_limite).length;
    summary.total_violations.harmonics_analyzed += r.harmonicsAnalysis.length;
  }
  return summary;
}

export type ColumnKind = "number" | "text" | "empty";

export interface ColumnStats {
  mean: number;
  std: number;  // sample (n - 1)
  min: number;
  max: number;
  median: number;
}

export interface TableSummary {
  total_rows: number;
  total_columns: number;
  numeric_columns: number;
  missing_values: number;
  duplicate_rows: number;
  column_types: Record<string, ColumnKind>;
  numeric_stats: Record<string, ColumnStats>;
}

const median = (sorted: readonly number[]): number => {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
};

function columnStats(values: readonly number[]): ColumnStats {
  const n = values.length;
  const mean = values.reduce((s, v) => s + v, 0) / n;
  const variance = n > 1 ? values.reduce((s, v) => s + (v - mean) ** 2, 0) / (n - 1) : NaN;
  const sorted = [...values].sort((a, b) => a - b);
  return { mean, std: Math.sqrt(variance), min: sorted[0], max: sorted[n - 1], median: median(sorted) };
}

/** Descriptive summary of a processed table; `null` for an empty one. */
export function summarizeTable(table: Table): TableSummary | null {
  if (table.rows.length === 0) return null;
  const column_types: Record<string, ColumnKind> = {};
  const numeric_stats: Record<string, ColumnStats> = {};
  let missing = 0;
  let numericCount = 0;

  table.columns.forEach((label, i) => {
    const cells = columnCells(table, i);
    missing += cells.filter((c) => isMissing(c)).length;
    const values = cells.filter((c): c is number => typeof c === "number");
    if (values.length === 0 && cells.every((c) => isMissing(c))) {
      column_types[label] = "empty";
    } else if (isNumericColumn(table, i)) {
      column_types[label] = "number";
      numericCount++;
      numeric_stats[label] = columnStats(values);
    } else {
      column_types[label] = "text";
    }
  });

  const seen = new Set<string>();
  let duplicates = 0;
  for (const row of table.rows) {
    const key = rowKey(row);
    if (seen.has(key)) duplicates++;
    else seen.add(key);
  }

  return {
    total_rows: table.rows.length,
    total_columns: table.columns.length,
    numeric_columns: numericCount,
    missing_values: missing,
    duplicate_rows: duplicates,
    column_types,
    numeric_stats,
  };
}
