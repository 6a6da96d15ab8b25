/**
 * Module: Analysis Store
 * Purpose: Persistence contract for analysis results plus an in-process implementation.
 * Assigns identifiers, scores completeness, and rebuilds per-category views by
 * flattening records across stored analyses with file metadata attached.
 */
import { roundTo } from "./sanitize.js";
import type { AnalysisResult, FlickerRecord, HarmonicRecord, ThdRecord, VoltageDeviationRecord } from "./types.js";

export type ProcessingStatus = "completed";

export interface StoredAnalysis {
  readonly id: number;
  readonly filename: string;
  readonly fileType: string;
  readonly result: AnalysisResult;
  readonly totalMeasurements: number;
  readonly validationScore: number;
  readonly processingStatus: ProcessingStatus;
  readonly timestamp: string;
}

export interface StoreStatistics {
  total_analyses: number;
  analyses_by_type: Record<string, number>;
  average_validation_score: number;
  total_measurements: number;
  last_updated: string;
}

export interface AnalysisStore {
  save(filename: string, fileType: string, result: AnalysisResult): number;
  /** Newest first. */
  list(): StoredAnalysis[];
  get(id: number): StoredAnalysis | undefined;
  delete(id: number): boolean;
  clear(): void;
  statistics(): StoreStatistics;
}

const SECTIONS = ["voltageDeviations", "flickers", "thdAnalysis", "harmonicsAnalysis"] as const;

/**
 * 100 points, minus 50 for an errored result, scaled by the share of non-empty
 * sections (25 each), clamped to [0, 100].
 */
export function computeValidationScore(result: AnalysisResult): number {
  let score = 100;
  if (result.error) score -= 50;
  const completeness = SECTIONS.reduce((n, s) => (result[s].length > 0 ? n + 25 : n), 0);
  score = Math.max(score * (completeness / 100), 0);
  return Math.min(100, score);
}

export class MemoryAnalysisStore implements AnalysisStore {
  private readonly items = new Map<number, StoredAnalysis>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  save(filename: string, fileType: string, result: AnalysisResult): number {
    const id = this.nextId++;
    // entries are shared by list()/get() and the category views
    this.items.set(id, Object.freeze({
      id,
      filename,
      fileType,
      result,
      totalMeasurements: result.totalMeasurements,
      validationScore: computeValidationScore(result),
      processingStatus: "completed",
      timestamp: this.now().toISOString(),
    }));
    return id;
  }

  list(): StoredAnalysis[] {
    return [...this.items.values()].sort((a, b) => b.timestamp.localeCompare(a.timestamp) || b.id - a.id);
  }

  get(id: number): StoredAnalysis | undefined {
    return this.items.get(id);
  }

  delete(id: number): boolean {
    return this.items.delete(id);
  }

  clear(): void {
    this.items.clear();
  }

  statistics(): StoreStatistics {
    const all = [...this.items.values()];
    const byType: Record<string, number> = {};
    for (const a of all) byType[a.fileType] = (byType[a.fileType] ?? 0) + 1;
    const avg = all.length ? all.reduce((s, a) => s + a.validationScore, 0) / all.length : 0;
    return {
      total_analyses: all.length,
      analyses_by_type: byType,
      average_validation_score: roundTo(avg, 2),
      total_measurements: all.reduce((s, a) => s + a.totalMeasurements, 0),
      last_updated: this.now().toISOString(),
    };
  }
}

export interface RecordMetadata {
  analysis_id: number;
  filename: string;
  file_type: string;
  timestamp: string;
  validation_score: number;
}

const metadataOf = (a: StoredAnalysis): RecordMetadata => ({
  analysis_id: a.id,
  filename: a.filename,
  file_type: a.fileType,
  timestamp: a.timestamp,
  validation_score: a.validationScore,
});

export const voltageDeviationRows = (store: AnalysisStore): Array<VoltageDeviationRecord & RecordMetadata> =>
  store.list().flatMap((a) => a.result.voltageDeviations.map((r) => ({ ...r, ...metadataOf(a) })));

export const flickerRows = (store: AnalysisStore): Array<FlickerRecord & RecordMetadata> =>
  store.list().flatMap((a) => a.result.flickers.map((r) => ({ ...r, ...metadataOf(a) })));

export const thdRows = (store: AnalysisStore): Array<ThdRecord & RecordMetadata> =>
  store.list().flatMap((a) => a.result.thdAnalysis.map((r) => ({ ...r, ...metadataOf(a) })));

export const harmonicRows = (store: AnalysisStore): Array<HarmonicRecord & RecordMetadata> =>
  store.list().flatMap((a) => a.result.harmonicsAnalysis.map((r) => ({ ...r, ...metadataOf(a) })));
