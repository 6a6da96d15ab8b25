/**
 * Module: Compliance Rules
 * Purpose: Evaluate resolved channels against the regulation limits.
 * - Voltage: the reference is the channel's own mean; limits are mean × (1 ± tolerance).
 * - Flicker (Pst) and THD: fixed upper limits.
 * - Harmonics: negative readings, counted against a fixed base rather than the row count.
 * Trend percentages use the normalized table's row count as denominator.
 */
import type { AnalysisConfig } from "./config.js";
import { channelValues } from "./schema.js";
import type { Channel, FlickerRecord, HarmonicRecord, Table, ThdRecord, VoltageDeviationRecord } from "./types.js";

export interface SeriesStats {
  count: number;
  mean: number;
  min: number;
  max: number;
}

export function seriesStats(values: readonly number[]): SeriesStats {
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { count: values.length, mean: values.length ? sum / values.length : NaN, min, max };
}

const countWhere = (values: readonly number[], pred: (v: number) => boolean): number =>
  values.reduce((n, v) => (pred(v) ? n + 1 : n), 0);

const percentOf = (count: number, total: number): number => (total > 0 ? (count / total) * 100 : 0);

export function evaluateVoltageDeviations(
  table: Table,
  channels: readonly Channel[],
  totalMeasurements: number,
  config: Pick<AnalysisConfig, "voltageDeviationTolerance">
): VoltageDeviationRecord[] {
  const band = config.voltageDeviationTolerance / 100;
  const out: VoltageDeviationRecord[] = [];
  for (const channel of channels) {
    const values = channelValues(table, channel);
    if (values.length === 0) continue;
    const { mean } = seriesStats(values);
    const upper = mean * (1 + band);
    const lower = mean * (1 - band);
    const violaciones = countWhere(values, (v) => v > upper || v < lower);
    out.push({
      fase: channel.phase,
      parametro: channel.column,
      voltaje_promedio: mean,
      limite_superior: upper,
      limite_inferior: lower,
      violaciones,
      total_mediciones: totalMeasurements,
      porcentaje_desviacion: percentOf(violaciones, totalMeasurements),
      excede_limite: violaciones > 0,
    });
  }
  return out;
}

export function evaluateFlicker(
  table: Table,
  channels: readonly Channel[],
  totalMeasurements: number,
  config: Pick<AnalysisConfig, "flickerLimit">
): FlickerRecord[] {
  const limite = config.flickerLimit;
  const out: FlickerRecord[] = [];
  for (const channel of channels) {
    const values = channelValues(table, channel);
    if (values.length === 0) continue;
    const { mean, max } = seriesStats(values);
    const violaciones = countWhere(values, (v) => v > limite);
    out.push({
      fase: channel.phase,
      parametro: channel.column,
      valor_promedio: mean,
      valor_maximo: max,
      limite,
      violaciones,
      total_mediciones: totalMeasurements,
      porcentaje_flicker: percentOf(violaciones, totalMeasurements),
      excede_limite: violaciones > 0,
    });
  }
  return out;
}

export function evaluateThd(
  table: Table,
  channels: readonly Channel[],
  totalMeasurements: number,
  config: Pick<AnalysisConfig, "thdLimit">
): ThdRecord[] {
  const limite = config.thdLimit;
  const out: ThdRecord[] = [];
  for (const channel of channels) {
    const values = channelValues(table, channel);
    if (values.length === 0) continue;
    const { mean, max } = seriesStats(values);
    const violaciones = countWhere(values, (v) => v > limite);
    out.push({
      fase: channel.phase,
      parametro: channel.column,
      thd_promedio: mean,
      thd_maximo: max,
      limite,
      violaciones,
      total_mediciones: totalMeasurements,
      porcentaje_thd: percentOf(violaciones, totalMeasurements),
      excede_limite: violaciones > 0,
    });
  }
  return out;
}

/**
 * Negative readings per harmonic channel. The denominator is always
 * `harmonicBaseMeasurements`; the channel's own value count is reported separately.
 */
export function evaluateHarmonics(
  table: Table,
  channels: readonly Channel[],
  config: Pick<AnalysisConfig, "harmonicBaseMeasurements">
): HarmonicRecord[] {
  const base = config.harmonicBaseMeasurements;
  const out: HarmonicRecord[] = [];
  for (const channel of channels) {
    if (channel.harmonicOrder === undefined || channel.harmonicOrder === 1) continue;
    const values = channelValues(table, channel);
    if (values.length === 0) continue;
    const { mean, min, count } = seriesStats(values);
    const negatives = countWhere(values, (v) => v < 0);
    out.push({
      orden_armonico: channel.harmonicOrder,
      fase: channel.phase,
      parametro: channel.column,
      valores_negativos: negatives,
      total_mediciones: base,
      porcentaje: percentOf(negatives, base),
      valor_promedio: mean,
      valor_minimo: min,
      total_valores_archivo: count,
    });
  }
  return out;
}
