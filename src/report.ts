import * as XLSX from "xlsx";
import { format } from "date-fns";
import { roundTo } from "./sanitize.js";
import { flickerRows, harmonicRows, thdRows, voltageDeviationRows, type AnalysisStore } from "./store.js";

/**
 * Module: Spreadsheet Report
 * Purpose: Export every stored analysis to one workbook, one sheet per category.
 * Columns are picked by their literal record field names; values are rounded here and
 * only here (voltages 3 decimals, flicker/THD 6, harmonic percentages 8).
 */

type SheetRow = Record<string, string | number | boolean>;

const appendSheet = (wb: XLSX.WorkBook, name: string, rows: SheetRow[]): void => {
  if (rows.length === 0) return;
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(rows), name);
};

export function buildAnalysisReport(store: AnalysisStore): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();

  const stats = store.statistics();
  XLSX.utils.book_append_sheet(
    wb,
    XLSX.utils.json_to_sheet([
      { Métrica: "total_analyses", Valor: stats.total_analyses },
      { Métrica: "analyses_by_type", Valor: JSON.stringify(stats.analyses_by_type) },
      { Métrica: "average_validation_score", Valor: stats.average_validation_score },
      { Métrica: "total_measurements", Valor: stats.total_measurements },
      { Métrica: "last_updated", Valor: stats.last_updated },
    ]),
    "Resumen"
  );

  appendSheet(wb, "Desviaciones_Voltaje", voltageDeviationRows(store).map((r) => ({
    filename: r.filename,
    fase: r.fase,
    voltaje_promedio: roundTo(r.voltaje_promedio, 3),
    porcentaje_desviacion: roundTo(r.porcentaje_desviacion, 6),
    violaciones: r.violaciones,
    total_mediciones: r.total_mediciones,
    excede_limite: r.excede_limite,
    timestamp: r.timestamp,
  })));

  appendSheet(wb, "Flickers", flickerRows(store).map((r) => ({
    filename: r.filename,
    fase: r.fase,
    valor_promedio: roundTo(r.valor_promedio, 6),
    porcentaje_flicker: roundTo(r.porcentaje_flicker, 6),
    violaciones: r.violaciones,
    total_mediciones: r.total_mediciones,
    excede_limite: r.excede_limite,
    timestamp: r.timestamp,
  })));

  appendSheet(wb, "Distorsion_Armonica", thdRows(store).map((r) => ({
    filename: r.filename,
    fase: r.fase,
    thd_promedio: roundTo(r.thd_promedio, 6),
    porcentaje_thd: roundTo(r.porcentaje_thd, 6),
    violaciones: r.violaciones,
    total_mediciones: r.total_mediciones,
    excede_limite: r.excede_limite,
    timestamp: r.timestamp,
  })));

  appendSheet(wb, "Analisis_Armonicos", harmonicRows(store).map((r) => ({
    filename: r.filename,
    orden_armonico: r.orden_armonico,
    fase: r.fase,
    porcentaje: roundTo(r.porcentaje, 8),
    valores_negativos: r.valores_negativos,
    total_mediciones: r.total_mediciones,
    valor_promedio: roundTo(r.valor_promedio, 6),
    timestamp: r.timestamp,
  })));

  appendSheet(wb, "Archivos_Procesados", store.list().map((a) => ({
    ID: a.id,
    Archivo: a.filename,
    Tipo: a.fileType,
    Mediciones: a.totalMeasurements,
    Puntuación: a.validationScore,
    Estado: a.processingStatus,
    Fecha: a.timestamp,
  })));

  return wb;
}

/** Serialize the report to `.xlsx` bytes. */
export function writeAnalysisReport(store: AnalysisStore): ArrayBuffer {
  const out: unknown = XLSX.write(buildAnalysisReport(store), { type: "array", bookType: "xlsx" });
  if (!(out instanceof ArrayBuffer)) throw new Error("unexpected workbook output");
  return out;
}

export const reportFileName = (date: Date): string => `analisis_completo_${format(date, "yyyyMMdd_HHmmss")}.xlsx`;
