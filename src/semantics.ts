/**
 * Module: Header Semantics
 * Purpose: Normalize meter column labels and read meaning out of them: whether a column
 * holds numbers for a given file type, which phase it belongs to and which harmonic order
 * it carries.
 */
import type { Phase } from "./types.js";

const NUMERIC_KEYWORDS_BY_FILE_TYPE: Record<string, readonly string[]> = {
  tendencia: ["voltage", "current", "power", "frequency", "thd"],
  armonicos_potencia: ["harmonic", "magnitude", "phase", "distortion"],
  armonicos_voltaje: ["voltage", "harmonic", "amplitude", "phase"],
};

const NUMERIC_INDICATORS = [
  "value", "val", "measurement", "reading", "level", "amplitude",
  "magnitude", "rms", "avg", "min", "max", "std", "mean",
  "percent", "ratio", "factor", "time", "date", "timestamp",
] as const;

// Auto-generated headers such as "Unnamed: 3" and SheetJS "__EMPTY_2"
const PLACEHOLDER_RE = /^(unnamed|__empty)/;

/**
 * Strip punctuation, collapse whitespace to `_`, lower-case.
 * Returns `undefined` for placeholder labels and labels with nothing left.
 */
export function normalizeLabel(raw: string): string | undefined {
  const collapsed = raw
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .trim()
    .replace(/\s+/g, "_")
    .toLowerCase();
  const label = collapsed.replace(/^_+|_+$/g, "");
  if (PLACEHOLDER_RE.test(collapsed) || PLACEHOLDER_RE.test(label)) return undefined;
  return label || undefined;
}

/**
 * Normalize a list of labels keeping them unique: the second `value` becomes `value_1`.
 * Dropped labels map to `undefined` so callers can drop the matching column.
 */
export function normalizeLabels(raw: readonly string[]): Array<string | undefined> {
  const seen = new Set<string>();
  return raw.map((r) => {
    const label = normalizeLabel(r);
    if (label === undefined) return undefined;
    let unique = label;
    for (let n = 1; seen.has(unique); n++) unique = `${label}_${n}`;
    seen.add(unique);
    return unique;
  });
}

export function isNumericLabel(label: string, fileType: string): boolean {
  const lower = label.toLowerCase();
  const keywords = NUMERIC_KEYWORDS_BY_FILE_TYPE[fileType] ?? [];
  if (keywords.some((k) => lower.includes(k))) return true;
  return NUMERIC_INDICATORS.some((k) => lower.includes(k));
}

/**
 * First of `l1`, `l2`, `l3` found in the label wins; otherwise `GENERAL`.
 */
export function extractPhase(label: string): Phase {
  const lower = label.toLowerCase();
  if (lower.includes("l1")) return "L1";
  if (lower.includes("l2")) return "L2";
  if (lower.includes("l3")) return "L3";
  return "GENERAL";
}

export const DEFAULT_HARMONIC_ORDER = 1;

// "P H 5 L2" as exported, or "p_h_5_l2" once normalized
export const HARMONIC_COLUMN_RE = /p[\s_]h[\s_](\d+)[\s_]l[123]/i;
const HARMONIC_ORDER_RE = /p[\s_]h[\s_](\d+)/i;

/**
 * Harmonic order from a power-harmonic label. Unparseable labels count as the
 * fundamental, which the harmonic rule then excludes.
 */
export function extractHarmonicOrder(label: string): number {
  const m = HARMONIC_ORDER_RE.exec(label);
  return m ? Number(m[1]) : DEFAULT_HARMONIC_ORDER;
}
