import type { Milliseconds } from "@/lib/types/common";

/**
 * One hourly point in a cumulative series
 */
export interface StatisticPoint {
  startMs: Milliseconds; // top of the hour, UTC
  state: number; // value for this hour (always >= 0)
  sum: number; // running total including this hour
}

export type UnitClass = "energy" | "volume" | "monetary";

export interface StatisticMetadata {
  seriesId: string;
  name: string;
  unit: string;
  unitClass: UnitClass;
  source: string;
  hasSum: true;
  hasMean: false;
}

/**
 * Long-term statistics store. Points are keyed by (seriesId, startMs);
 * appending a point at an existing key replaces it.
 */
export interface StatisticsStore {
  /** Most recent point of a series, or null when the series is empty */
  getLastStatistic(seriesId: string): Promise<StatisticPoint | null>;

  /** Most recent point strictly before `beforeMs`, or null */
  queryStatisticsBefore(
    seriesId: string,
    beforeMs: Milliseconds,
  ): Promise<StatisticPoint | null>;

  appendStatistics(
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): Promise<void>;

  /** Delete every point (and the metadata) of each listed series */
  clearStatistics(seriesIds: readonly string[]): Promise<void>;

  /**
   * Clear one series and write `points` atomically: readers see either the
   * old series or the new one
   */
  replaceStatistics(
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): Promise<void>;
}

/**
 * Starting point for a running sum. Points at or before `lastMs` are treated
 * as already imported.
 */
export interface Baseline {
  sum: number;
  lastMs: number;
}

export const ZERO_BASELINE: Baseline = { sum: 0, lastMs: 0 };

/**
 * Outcome of importing one series
 */
export interface SeriesImportResult {
  seriesId: string;
  numPoints: number;
  finalSum: number | null; // null when nothing was written
  cleared: boolean;
}

export interface ImportResult {
  success: boolean;
  series: SeriesImportResult[];
  errors: string[];
  durationMs: number;
}
