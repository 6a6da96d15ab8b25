import { resolveAnalysisConfig, type AnalysisConfig, type AnalysisConfigInput } from "./config.js";
import { evaluateFlicker, evaluateHarmonics, evaluateThd, evaluateVoltageDeviations } from "./rules.js";
import { resolveAnalysisPath, resolveChannels, resolveHarmonicChannels, TREND_CHANNEL_TEMPLATES } from "./schema.js";
import type { AnalysisError, AnalysisPath, AnalysisResult, Channel, Table } from "./types.js";
import { ENGINE_VERSION } from "./types.js";

/**
 * Module: Compliance Evaluator
 * Purpose: Dispatch a normalized table to its rule family and assemble the immutable
 * `AnalysisResult` handed to persistence.
 * Design:
 * - `armonicos_potencia` takes the harmonic path; any other tag takes the trend path.
 * - Channels are resolved and evaluated independently; a missing template only shows up
 *   in `meta.missingTemplates`.
 * - A table without rows yields an error-tagged result with no records.
 */

export interface AnalyzeOptions {
  config?: AnalysisConfig | AnalysisConfigInput;
  filename?: string;
  timestamp?: Date;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const freezeResult = (result: Mutable<AnalysisResult>): AnalysisResult =>
  Object.freeze({
    ...result,
    voltageDeviations: Object.freeze(result.voltageDeviations.map((r) => Object.freeze(r))),
    flickers: Object.freeze(result.flickers.map((r) => Object.freeze(r))),
    thdAnalysis: Object.freeze(result.thdAnalysis.map((r) => Object.freeze(r))),
    harmonicsAnalysis: Object.freeze(result.harmonicsAnalysis.map((r) => Object.freeze(r))),
    meta: Object.freeze({
      ...result.meta,
      resolvedColumns: Object.freeze([...result.meta.resolvedColumns]),
      missingTemplates: Object.freeze([...result.meta.missingTemplates]),
    }),
  });

const baseResult = (fileType: string, path: AnalysisPath, options?: AnalyzeOptions): Mutable<AnalysisResult> => ({
  fileType,
  ...(options?.filename !== undefined ? { filename: options.filename } : {}),
  totalMeasurements: 0,
  voltageDeviations: [],
  flickers: [],
  thdAnalysis: [],
  harmonicsAnalysis: [],
  ...(options?.timestamp ? { processedAt: options.timestamp.toISOString() } : {}),
  meta: { analysisPath: path, resolvedColumns: [], missingTemplates: [], engineVersion: ENGINE_VERSION },
});

/**
 * Result carrying a single structural error and no records.
 */
export function errorResult(fileType: string, error: AnalysisError, options?: AnalyzeOptions): AnalysisResult {
  const result = baseResult(fileType, resolveAnalysisPath(fileType), options);
  result.error = error;
  return freezeResult(result);
}

/**
 * Evaluate a normalized table.
 *
 * Parameters:
 * - `table`: output of `cleanTable`.
 * - `fileType`: `tendencia`, `armonicos_potencia`, or any other tag (analyzed as trend).
 * - `options`: thresholds (`config`), and `filename`/`timestamp` stamped as metadata.
 */
export function analyze(table: Table, fileType: string, options?: AnalyzeOptions): AnalysisResult {
  if (table.rows.length === 0) {
    return errorResult(fileType, { code: "E_NO_VALID_DATA", message: "no valid data after cleaning" }, options);
  }
  const config = resolveAnalysisConfig(options?.config);
  const path = resolveAnalysisPath(fileType);
  const result = baseResult(fileType, path, options);
  result.totalMeasurements = table.rows.length;
  const resolved: string[] = [];

  if (path === "harmonic") {
    const channels = resolveHarmonicChannels(table);
    resolved.push(...channels.map((c) => c.column));
    result.harmonicsAnalysis = evaluateHarmonics(table, channels, config);
    result.harmonicBaseMeasurements = config.harmonicBaseMeasurements;
    result.meta = { ...result.meta, resolvedColumns: resolved };
    return freezeResult(result);
  }

  const missing: string[] = [];
  const resolveAll = (templates: readonly string[]): Channel[] =>
    templates.flatMap((template) => {
      const channels = resolveChannels(table, template);
      if (channels.length === 0) missing.push(template);
      resolved.push(...channels.map((c) => c.column));
      return channels;
    });

  const total = result.totalMeasurements;
  result.voltageDeviations = evaluateVoltageDeviations(table, resolveAll(TREND_CHANNEL_TEMPLATES.voltage), total, config);
  result.flickers = evaluateFlicker(table, resolveAll(TREND_CHANNEL_TEMPLATES.flicker), total, config);
  result.thdAnalysis = evaluateThd(table, resolveAll(TREND_CHANNEL_TEMPLATES.thd), total, config);
  result.meta = { ...result.meta, resolvedColumns: resolved, missingTemplates: missing };
  return freezeResult(result);
}
