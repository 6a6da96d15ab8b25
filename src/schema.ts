import { extractHarmonicOrder, extractPhase, HARMONIC_COLUMN_RE, normalizeLabel } from "./semantics.js";
import { coerceNumeric } from "./sanitize.js";
import type { AnalysisPath, Channel, Issue, Table } from "./types.js";

/**
 * Module: Channel Resolution
 * Purpose: Map regulation channel templates onto the actual columns of a normalized
 * table and pull numeric series out of them.
 * Notes:
 * - Templates and labels go through the same label normalizer before the substring
 *   check, so "U L1 avg. 10 min [V]" finds both the raw and the normalized header.
 * - Every match is a channel of its own; duplicate or alternately-labeled columns are
 *   all evaluated. No match is not an error.
 */

export type TrendChannelKind = "voltage" | "flicker" | "thd";

export const TREND_CHANNEL_TEMPLATES: Record<TrendChannelKind, readonly string[]> = {
  voltage: ["U L1 avg. 10 min [V]", "U L2 avg. 10 min [V]", "U L3 avg. 10 min [V]"],
  flicker: ["Pst L1 instant. 10 min", "Pst L2 instant. 10 min", "Pst L3 instant. 10 min"],
  thd: ["THD U L1 avg. 10 min [%]", "THD U L2 avg. 10 min [%]", "THD U L3 avg. 10 min [%]"],
};

export const DEFAULT_ANALYSIS_PATH: AnalysisPath = "trend";

/** Only power-harmonic files take the harmonic path; every other tag is analyzed as trend. */
export function resolveAnalysisPath(fileType: string): AnalysisPath {
  return fileType === "armonicos_potencia" ? "harmonic" : DEFAULT_ANALYSIS_PATH;
}

const comparable = (label: string): string => normalizeLabel(label) ?? label.toLowerCase();

export function resolveChannels(table: Table, template: string): Channel[] {
  const needle = comparable(template);
  const out: Channel[] = [];
  table.columns.forEach((column, index) => {
    if (comparable(column).includes(needle)) out.push({ column, index, phase: extractPhase(column) });
  });
  return out;
}

/**
 * Every `P H <n> L<k>` column except the fundamental (order 1, which is also what an
 * unparseable order falls back to).
 */
export function resolveHarmonicChannels(table: Table): Channel[] {
  const out: Channel[] = [];
  table.columns.forEach((column, index) => {
    if (!HARMONIC_COLUMN_RE.test(column)) return;
    const harmonicOrder = extractHarmonicOrder(column);
    if (harmonicOrder === 1) return;
    out.push({ column, index, phase: extractPhase(column), harmonicOrder });
  });
  return out;
}

/** Non-missing numeric values of a channel; strings go through the lenient coercion. */
export function channelValues(table: Table, channel: Channel): number[] {
  const values: number[] = [];
  for (const row of table.rows) {
    const n = coerceNumeric(row[channel.index]);
    if (n !== null) values.push(n);
  }
  return values;
}

const REQUIRED_TREND_PATTERNS: Array<{ pattern: RegExp; name: string }> = [
  { pattern: /u[\s_]l/, name: "u l" },
  { pattern: /pst/, name: "pst" },
  { pattern: /thd/, name: "thd" },
];

export interface FormatValidation {
  is_valid: boolean;
  detected_type: string;
  total_rows: number;
  total_columns: number;
  issues: Issue[];
}

/**
 * Check that a table carries the columns its file type is analyzed from.
 * Trend files need voltage, Pst and THD columns; power-harmonic files at least three
 * harmonic channels.
 */
export function validateTableFormat(table: Table, expectedType: string): FormatValidation {
  const issues: Issue[] = [];
  const labels = table.columns.map((c) => c.toLowerCase());
  if (expectedType === "tendencia") {
    for (const { pattern, name } of REQUIRED_TREND_PATTERNS) {
      if (!labels.some((l) => pattern.test(l))) {
        issues.push({ field: "columns", code: "E_PATTERN_MISSING", msg: `pattern '${name}' not found`, level: "error" });
      }
    }
  } else if (expectedType === "armonicos_potencia") {
    const found = table.columns.filter((c) => HARMONIC_COLUMN_RE.test(c));
    if (found.length < 3) {
      issues.push({ field: "columns", code: "E_FEW_HARMONICS", msg: `only ${found.length} harmonic columns found`, level: "error" });
    }
  }
  return {
    is_valid: issues.length === 0,
    detected_type: expectedType,
    total_rows: table.rows.length,
    total_columns: table.columns.length,
    issues,
  };
}
