import { analyze, errorResult } from "./analyzeCore.js";
import { cleanTable } from "./cleanTable.js";
import { resolveAnalysisConfig, type AnalysisConfigInput } from "./config.js";
import { parseCsvToRows } from "./csv.js";
import { consoleLogger, type Logger } from "./logger.js";
import { readWorkbookToTable } from "./xlsx.js";
import type { AnalysisResult, FileType, RawTable } from "./types.js";

export * from "./types.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./semantics.js";
export * from "./sanitize.js";
export * from "./table.js";
export * from "./cleanTable.js";
export * from "./schema.js";
export * from "./rules.js";
export * from "./analyzeCore.js";
export * from "./csv.js";
export * from "./xlsx.js";
export * from "./store.js";
export * from "./report.js";
export * from "./summary.js";

/**
 * Module: Compliance Core Entry Point
 * Purpose: Read a meter export from bytes, clean it and evaluate it against the
 * regulation limits, always returning an `AnalysisResult`.
 * Notes:
 * - Accepts `ArrayBuffer` so the same call works in Node and in the browser.
 * - Read failures and tables left empty by cleaning come back as error-tagged results.
 */

export const DEFAULT_FILE_TYPE: FileType = "tendencia";

/**
 * Infer the file type from the export's file name. Anything that is not a harmonic
 * export is treated as a trend file.
 */
export function detectFileType(filename: string): FileType {
  const lower = filename.toLowerCase();
  if (lower.includes("tendencia")) return "tendencia";
  if (lower.includes("armonic")) return "armonicos_potencia";
  return DEFAULT_FILE_TYPE;
}

export interface AnalyzeFileOptions {
  fileType?: string;
  config?: AnalysisConfigInput;
  sheetName?: string;
  logger?: Logger;
  now?: () => Date;
}

const isTextExport = (lower: string): boolean => lower.endsWith(".csv") || lower.endsWith(".txt");

/**
 * Analyze one meter export.
 *
 * Parameters:
 * - `fileBytes`: `ArrayBuffer` of the uploaded file.
 * - `filename`: original name; picks the reader (`.csv`/`.txt` vs workbook) and, unless
 *   `options.fileType` is given, the file type.
 * - `options`: thresholds and header row (`config`), `sheetName`, `logger`, `now`.
 *
 * Returns: `AnalysisResult` stamped with `filename` and `processedAt`.
 * Throws only for an invalid `config` (`ZodError`).
 */
export async function analyzeFileFromBuffer(
  fileBytes: ArrayBuffer,
  filename: string,
  options?: AnalyzeFileOptions
): Promise<AnalysisResult> {
  const config = resolveAnalysisConfig(options?.config);
  const logger = options?.logger ?? consoleLogger;
  const fileType = options?.fileType ?? detectFileType(filename);
  const stamp = { filename, timestamp: (options?.now ?? (() => new Date()))() };

  let raw: RawTable;
  try {
    const lower = filename.toLowerCase();
    raw = isTextExport(lower)
      ? parseCsvToRows(new TextDecoder("utf-8").decode(fileBytes), { headerRow: config.headerRow })
      : readWorkbookToTable(fileBytes, { headerRow: config.headerRow, sheetName: options?.sheetName });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`failed to read ${filename}: ${message}`);
    return errorResult(fileType, { code: "E_READ_FAILED", message: `error processing file: ${message}` }, stamp);
  }

  if (raw.length === 0) {
    logger.warn(`${filename} has no rows below the header`);
    return errorResult(fileType, { code: "E_EMPTY_FILE", message: "file is empty or has no valid data" }, stamp);
  }

  const table = cleanTable(raw, fileType, config.gapFillStrategy, { logger });
  if (table.rows.length === 0) {
    logger.warn(`${filename} has no valid data after cleaning`);
  }
  return analyze(table, fileType, { config, ...stamp });
}
