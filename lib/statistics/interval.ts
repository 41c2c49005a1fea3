/**
 * Interval-read import: clear and replace
 *
 * Reads from yesterday's UTC midnight onward are bucketed hourly and written
 * with sums restarting at 0. The hourly AMI feed stops about two days back,
 * so the two feeds meet at that cutoff.
 */

import { formatTimeUTC, getYesterdayMidnightUtc } from "@/lib/date-utils";
import type { Direction } from "@/lib/types/common";
import type { IntervalRead } from "@/lib/utility/types";
import {
  accumulate,
  bucketByHour,
  hasNegative,
  type RawReading,
} from "./buckets";
import { intervalSeries, toMetadata } from "./series";
import {
  ZERO_BASELINE,
  type SeriesImportResult,
  type StatisticPoint,
  type StatisticsStore,
} from "./types";

function toRawReadings(reads: readonly IntervalRead[]): RawReading[] {
  return reads.map((read) => ({ time: read.startTime, quantity: read.value }));
}

/**
 * Bucket one direction of an interval batch into points (pure)
 */
export function buildIntervalPoints(
  reads: readonly RawReading[],
  direction: Direction,
  cutoffMs: number,
): StatisticPoint[] {
  const { buckets, stats } = bucketByHour(reads, { direction, cutoffMs });

  if (stats.beforeCutoff > 0) {
    console.log(
      `[Statistics] Interval ${direction}: skipped ${stats.beforeCutoff} reads older than ${formatTimeUTC(cutoffMs)}`,
    );
  }
  if (stats.parseFailures > 0) {
    console.debug(
      `[Statistics] Interval ${direction}: dropped ${stats.parseFailures} unparseable reads`,
    );
  }

  return accumulate(buckets, ZERO_BASELINE).points;
}

/**
 * Replace a meter's interval series with the current batch
 */
export async function reconcileInterval(
  store: StatisticsStore,
  servicePoint: string,
  reads: readonly IntervalRead[],
  now: Date,
): Promise<SeriesImportResult[]> {
  const raw = toRawReadings(reads);
  const cutoffMs = getYesterdayMidnightUtc(now);

  const directions: Direction[] = ["consumption"];
  const returnSeries = intervalSeries(servicePoint, "return");
  if (
    hasNegative(raw) ||
    (await store.getLastStatistic(returnSeries.seriesId)) !== null
  ) {
    directions.push("return");
  }

  const results: SeriesImportResult[] = [];
  for (const direction of directions) {
    const series = intervalSeries(servicePoint, direction);
    const points =
      direction === "return" && !hasNegative(raw)
        ? []
        : buildIntervalPoints(raw, direction, cutoffMs);

    // One transaction: a failed write leaves the previous series in place
    await store.replaceStatistics(toMetadata(series), points);

    if (points.length === 0) {
      console.log(
        `[Statistics] ${series.seriesId}: no interval data since ${formatTimeUTC(cutoffMs)}`,
      );
      results.push({
        seriesId: series.seriesId,
        numPoints: 0,
        finalSum: null,
        cleared: true,
      });
      continue;
    }

    const finalSum = points[points.length - 1].sum;
    console.log(
      `[Statistics] Replaced ${series.seriesId} with ${points.length} hourly points (sum=${finalSum.toFixed(3)})`,
    );
    results.push({
      seriesId: series.seriesId,
      numPoints: points.length,
      finalSum,
      cleared: true,
    });
  }

  return results;
}
