import { isValid, parseISO } from "date-fns";
import type { Cell } from "./types.js";

/**
 * Module: Cell Sanitizers
 * Purpose: Value-level helpers shared by the normalizer, the rules and the report:
 * lenient numeric coercion, half-to-even rounding, phase-angle wrapping and
 * timestamp keys. None of them throw.
 */

const NON_NUMERIC_CHARS_RE = /[^\d.\-+eE]/g;

/**
 * Coerce a cell to a finite number or `null`.
 * Strings keep only digits, `.`, `-`, `+`, `e`, `E` before a strict parse, so
 * "230,5 V" → 2305 and "1.2.3" → null.
 */
export function coerceNumeric(v: Cell | undefined): number | null {
  if (v === undefined || v === null) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = v.replace(NON_NUMERIC_CHARS_RE, "");
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export const isMissing = (v: Cell | undefined): boolean => v === undefined || v === null;

export const isBlank = (v: Cell | undefined): boolean => isMissing(v) || String(v).trim() === "";

/** Round to the nearest integer, ties to even (2.5 → 2, 3.5 → 4). */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Wrap an angle in degrees into [-180, 180). In-range values are returned as-is so
 * wrapping twice never drifts.
 */
export function wrapPhaseAngle(deg: number): number {
  if (deg >= -180 && deg < 180) return deg;
  const m = (((deg + 180) % 360) + 360) % 360;
  return m - 180;
}

/**
 * Sort key for a timestamp cell: numbers (sheet serials, epoch values) as-is, strings
 * parsed as ISO-8601. Anything else yields `null`.
 */
export function timestampKey(v: Cell | undefined): number | null {
  if (v === undefined || v === null) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = v.trim();
  if (!s) return null;
  const d = parseISO(s);
  return isValid(d) ? d.getTime() : null;
}

export function roundTo(x: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(x * f) / f;
}
