/**
 * Module: Public Types & Engine Version
 * Purpose: Define the table shapes, channel/record contracts and the analysis result
 * handed to persistence, plus the engine version banner exposed in `meta`.
 */
export type Cell = string | number | null;
export type RawRow = Record<string, Cell>;
export type RawTable = RawRow[];

/**
 * Column-ordered, immutable table. Every cleaning stage takes one and returns a new one.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly Cell[])[];
}

export type FileType =
  | "tendencia"           // Trend export: voltage, flicker and THD per phase
  | "armonicos_potencia"  // Power-harmonic export: P H <n> L<k> channels
  | "armonicos_voltaje";  // Voltage-harmonic export (cleaned, analyzed as trend)

export type GapFillStrategy = "linear_interpolation" | "forward_fill" | "backward_fill" | "remove";
export type AnalysisPath = "trend" | "harmonic";
export type Phase = "L1" | "L2" | "L3" | "GENERAL";

export interface Channel {
  column: string;
  index: number;
  phase: Phase;
  harmonicOrder?: number;
}

export type IssueLevel = "error" | "warn";
export type Issue = { field: string; code: string; msg: string; level: IssueLevel };

// Field names below are selected positionally by the spreadsheet report; keep them literal.
export interface VoltageDeviationRecord {
  fase: Phase;
  parametro: string;
  voltaje_promedio: number;
  limite_superior: number;
  limite_inferior: number;
  violaciones: number;
  total_mediciones: number;
  porcentaje_desviacion: number;
  excede_limite: boolean;
}

export interface FlickerRecord {
  fase: Phase;
  parametro: string;
  valor_promedio: number;
  valor_maximo: number;
  limite: number;
  violaciones: number;
  total_mediciones: number;
  porcentaje_flicker: number;
  excede_limite: boolean;
}

export interface ThdRecord {
  fase: Phase;
  parametro: string;
  thd_promedio: number;
  thd_maximo: number;
  limite: number;
  violaciones: number;
  total_mediciones: number;
  porcentaje_thd: number;
  excede_limite: boolean;
}

export interface HarmonicRecord {
  orden_armonico: number;
  fase: Phase;
  parametro: string;
  valores_negativos: number;
  total_mediciones: number;  // Fixed base, never the row count
  porcentaje: number;
  valor_promedio: number;
  valor_minimo: number;
  total_valores_archivo: number;  // Non-missing values in the channel (diagnostic only)
}

export type AnalysisErrorCode = "E_READ_FAILED" | "E_EMPTY_FILE" | "E_NO_VALID_DATA";

export interface AnalysisError {
  code: AnalysisErrorCode;
  message: string;
}

export interface AnalysisResult {
  readonly fileType: string;
  readonly filename?: string;
  readonly totalMeasurements: number;
  readonly voltageDeviations: readonly VoltageDeviationRecord[];
  readonly flickers: readonly FlickerRecord[];
  readonly thdAnalysis: readonly ThdRecord[];
  readonly harmonicsAnalysis: readonly HarmonicRecord[];
  readonly harmonicBaseMeasurements?: number;
  readonly processedAt?: string;  // Metadata; never affects counts
  readonly error?: AnalysisError;
  readonly meta: {
    readonly analysisPath: AnalysisPath;
    readonly resolvedColumns: readonly string[];
    readonly missingTemplates: readonly string[];
    readonly engineVersion: string;
  };
}

export const ENGINE_VERSION = "0.1.0";
