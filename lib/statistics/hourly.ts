/**
 * Hourly AMI import
 *
 * Electric meters split into a consumption series and (only when the batch
 * has a negative reading) a return series. Gas meters feed a single series
 * through the configured gas conversion.
 *
 * Baseline by mode:
 *   FIRST         (0, 0), every reading is new
 *   MIDNIGHT      sum of the last point before the batch's earliest hour,
 *                 lastMs = 0 so the whole trailing window is re-imported
 *   otherwise     the series' last point
 */

import { RefreshMode } from "@/lib/coordinator/refresh-mode";
import { formatTimeUTC } from "@/lib/date-utils";
import type { FuelType } from "@/lib/types/common";
import type { AmiEnergyUsage } from "@/lib/utility/types";
import {
  accumulate,
  bucketByHour,
  earliestHour,
  hasNegative,
  type DirectionFilter,
  type RawReading,
} from "./buckets";
import { getGasConversion, type GasConversion } from "./conversions";
import { hourlySeries, toMetadata, type SeriesDescriptor } from "./series";
import {
  ZERO_BASELINE,
  type Baseline,
  type SeriesImportResult,
  type StatisticPoint,
  type StatisticsStore,
} from "./types";

export interface HourlyImportOptions {
  gasConversion?: GasConversion;
}

function toRawReadings(readings: readonly AmiEnergyUsage[]): RawReading[] {
  return readings.map((reading) => ({
    time: reading.date,
    quantity: reading.quantity,
  }));
}

/**
 * Build the new points for one series from a batch (pure)
 */
export function buildHourlyPoints(
  readings: readonly RawReading[],
  baseline: Baseline,
  direction: DirectionFilter,
  convert?: (quantity: number) => number,
): StatisticPoint[] {
  const { buckets, stats } = bucketByHour(readings, { direction, convert });

  if (stats.parseFailures > 0) {
    console.debug(
      `[Statistics] Dropped ${stats.parseFailures} hourly readings with unparseable timestamps or quantities`,
    );
  }

  const { points, alreadyImported } = accumulate(buckets, baseline);
  if (alreadyImported > 0) {
    console.debug(
      `[Statistics] Skipped ${alreadyImported} already-imported hours`,
    );
  }
  return points;
}

/**
 * Pick the running-sum baseline for a series
 */
export async function resolveHourlyBaseline(
  store: StatisticsStore,
  seriesId: string,
  mode: RefreshMode,
  readings: readonly RawReading[],
): Promise<Baseline> {
  if (mode === RefreshMode.FIRST) {
    console.log(
      `[Statistics] First refresh for ${seriesId}: importing all ${readings.length} readings`,
    );
    return ZERO_BASELINE;
  }

  if (mode === RefreshMode.MIDNIGHT) {
    const earliest = earliestHour(readings);
    if (earliest !== null) {
      const before = await store.queryStatisticsBefore(seriesId, earliest);
      console.log(
        `[Statistics] Midnight refresh for ${seriesId}: re-importing ${readings.length} readings ` +
          `from sum=${(before?.sum ?? 0).toFixed(3)} before ${formatTimeUTC(earliest)}`,
      );
      return { sum: before?.sum ?? 0, lastMs: 0 };
    }
  }

  const last = await store.getLastStatistic(seriesId);
  return last ? { sum: last.sum, lastMs: last.startMs } : ZERO_BASELINE;
}

async function importSeries(
  store: StatisticsStore,
  series: SeriesDescriptor,
  readings: readonly RawReading[],
  direction: DirectionFilter,
  mode: RefreshMode,
  convert?: (quantity: number) => number,
): Promise<SeriesImportResult> {
  const baseline = await resolveHourlyBaseline(
    store,
    series.seriesId,
    mode,
    readings,
  );
  const points = buildHourlyPoints(readings, baseline, direction, convert);

  if (points.length === 0) {
    console.log(`[Statistics] ${series.seriesId}: no new hourly points`);
    return {
      seriesId: series.seriesId,
      numPoints: 0,
      finalSum: null,
      cleared: false,
    };
  }

  await store.appendStatistics(toMetadata(series), points);

  const finalSum = points[points.length - 1].sum;
  console.log(
    `[Statistics] Imported ${points.length} hourly points for ${series.seriesId} (sum=${finalSum.toFixed(3)})`,
  );
  return {
    seriesId: series.seriesId,
    numPoints: points.length,
    finalSum,
    cleared: false,
  };
}

/**
 * Import one meter's AMI batch into its hourly series
 */
export async function reconcileHourly(
  store: StatisticsStore,
  servicePoint: string,
  readings: readonly AmiEnergyUsage[],
  fuelType: FuelType | string,
  mode: RefreshMode,
  options: HourlyImportOptions = {},
): Promise<SeriesImportResult[]> {
  const raw = toRawReadings(readings);

  if (fuelType === "Gas") {
    const conversion = options.gasConversion ?? getGasConversion();
    return [
      await importSeries(
        store,
        hourlySeries(servicePoint, "gas"),
        raw,
        "all",
        mode,
        conversion.convert,
      ),
    ];
  }

  const results = [
    await importSeries(
      store,
      hourlySeries(servicePoint, "electric", "consumption"),
      raw,
      "consumption",
      mode,
    ),
  ];

  if (hasNegative(raw)) {
    results.push(
      await importSeries(
        store,
        hourlySeries(servicePoint, "electric", "return"),
        raw,
        "return",
        mode,
      ),
    );
  }

  return results;
}
