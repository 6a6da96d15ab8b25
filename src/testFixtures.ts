import { analyze } from "./analyzeCore.js";
import { cleanTable } from "./cleanTable.js";
import type { AnalysisResult, RawTable } from "./types.js";

/** Trend export with one L1 channel per category; L1 voltage has one reading far off the mean. */
export const trendRows = (): RawTable => [
  { "Time": 1, "U L1 avg. 10 min [V]": 120, "Pst L1 instant. 10 min": 0.4, "THD U L1 avg. 10 min [%]": 2 },
  { "Time": 2, "U L1 avg. 10 min [V]": 120, "Pst L1 instant. 10 min": 1.5, "THD U L1 avg. 10 min [%]": 3 },
  { "Time": 3, "U L1 avg. 10 min [V]": 120, "Pst L1 instant. 10 min": 0.6, "THD U L1 avg. 10 min [%]": 7 },
  { "Time": 4, "U L1 avg. 10 min [V]": 160, "Pst L1 instant. 10 min": 0.5, "THD U L1 avg. 10 min [%]": 4 },
];

/** Power-harmonic export with orders 1 and 3 on L2. */
export const harmonicRows = (): RawTable => [
  { "P H 1 L2": 10, "P H 3 L2": -0.5 },
  { "P H 1 L2": 11, "P H 3 L2": 0.25 },
  { "P H 1 L2": 12, "P H 3 L2": 0.75 },
];

export const trendResult = (): AnalysisResult => analyze(cleanTable(trendRows(), "tendencia"), "tendencia");

export const harmonicResult = (): AnalysisResult =>
  analyze(cleanTable(harmonicRows(), "armonicos_potencia"), "armonicos_potencia");
