/**
 * Shared steps for turning raw readings into cumulative hourly points:
 * direction filtering, hour bucketing and running-sum accumulation.
 */

import { parseUtcTimestamp, truncateToHour } from "@/lib/date-utils";
import { ParseFailure } from "@/lib/errors";
import type { Direction, Milliseconds } from "@/lib/types/common";
import type { Baseline, StatisticPoint } from "./types";

/** "all" keeps every reading unchanged (gas) */
export type DirectionFilter = Direction | "all";

export interface RawReading {
  time: string | null | undefined;
  quantity: number;
}

export interface BucketStats {
  parseFailures: number;
  filtered: number; // other direction
  beforeCutoff: number;
}

export interface BucketOptions {
  direction: DirectionFilter;
  convert?: (quantity: number) => number;
  /** Drop buckets whose hour starts before this instant */
  cutoffMs?: number;
}

/**
 * Parse a reading's timestamp and truncate it to the hour
 * @throws ParseFailure for an empty or malformed timestamp
 */
export function readingHour(time: string | null | undefined): Milliseconds {
  const parsed = parseUtcTimestamp(time);
  if (parsed === null) {
    throw new ParseFailure(`Unparseable timestamp: "${time ?? ""}"`, time);
  }
  return truncateToHour(parsed);
}

/**
 * Map a signed quantity onto a direction
 * @returns the stored (non-negative for split series) value, or null when the
 * reading belongs to the other direction
 */
export function selectDirection(
  quantity: number,
  direction: DirectionFilter,
): number | null {
  switch (direction) {
    case "all":
      return quantity;
    case "consumption":
      return quantity >= 0 ? quantity : null;
    case "return":
      return quantity < 0 ? Math.abs(quantity) : null;
  }
}

export function hasNegative(readings: readonly RawReading[]): boolean {
  return readings.some((reading) => reading.quantity < 0);
}

/**
 * Sum readings into hourly buckets keyed by hour start
 */
export function bucketByHour(
  readings: readonly RawReading[],
  options: BucketOptions,
): { buckets: Map<Milliseconds, number>; stats: BucketStats } {
  const buckets = new Map<Milliseconds, number>();
  const stats: BucketStats = { parseFailures: 0, filtered: 0, beforeCutoff: 0 };

  for (const reading of readings) {
    if (!Number.isFinite(reading.quantity)) {
      stats.parseFailures++;
      continue;
    }

    const selected = selectDirection(reading.quantity, options.direction);
    if (selected === null) {
      stats.filtered++;
      continue;
    }

    let hour: Milliseconds;
    try {
      hour = readingHour(reading.time);
    } catch (error) {
      if (!(error instanceof ParseFailure)) throw error;
      stats.parseFailures++;
      continue;
    }

    if (options.cutoffMs !== undefined && hour < options.cutoffMs) {
      stats.beforeCutoff++;
      continue;
    }

    const value = options.convert ? options.convert(selected) : selected;
    buckets.set(hour, (buckets.get(hour) ?? 0) + value);
  }

  return { buckets, stats };
}

/**
 * Walk buckets in time order and emit points after the baseline
 */
export function accumulate(
  buckets: ReadonlyMap<Milliseconds, number>,
  baseline: Baseline,
): { points: StatisticPoint[]; alreadyImported: number } {
  const points: StatisticPoint[] = [];
  let runningSum = baseline.sum;
  let alreadyImported = 0;

  const hours = [...buckets.keys()].sort((a, b) => a - b);
  for (const hour of hours) {
    if (hour <= baseline.lastMs) {
      alreadyImported++;
      continue;
    }
    const state = buckets.get(hour) ?? 0;
    runningSum += state;
    points.push({ startMs: hour, state, sum: runningSum });
  }

  return { points, alreadyImported };
}

/**
 * Earliest parseable hour in a batch, or null when nothing parses
 */
export function earliestHour(
  readings: readonly RawReading[],
): Milliseconds | null {
  let earliest: Milliseconds | null = null;
  for (const reading of readings) {
    const parsed = parseUtcTimestamp(reading.time);
    if (parsed === null) continue;
    const hour = truncateToHour(parsed);
    if (earliest === null || hour < earliest) earliest = hour;
  }
  return earliest;
}
