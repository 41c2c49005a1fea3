/**
 * Statistics import for a published snapshot
 *
 * Only feeds fetched in the snapshot's own cycle are imported; data kept
 * from earlier cycles has already been imported.
 *
 * Series are written one after another. A failure in one series is recorded
 * and the import moves on; an interrupted series never gets a partial batch
 * because each store append is atomic.
 */

import { RefreshMode } from "@/lib/coordinator/refresh-mode";
import type { CoordinatorSnapshot } from "@/lib/coordinator/snapshot";
import { describeError } from "@/lib/errors";
import type { GasConversion } from "./conversions";
import { reconcileHourly } from "./hourly";
import { reconcileInterval } from "./interval";
import { reconcileMonthlyCosts, reconcileMonthlyUsage } from "./monthly";
import type {
  ImportResult,
  SeriesImportResult,
  StatisticsStore,
} from "./types";

export interface ImportOptions {
  now?: Date;
  gasConversion?: GasConversion;
}

export async function importAllStatistics(
  snapshot: CoordinatorSnapshot,
  store: StatisticsStore,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const { mode } = snapshot;
  const result: ImportResult = {
    success: true,
    series: [],
    errors: [],
    durationMs: 0,
  };

  async function step(
    label: string,
    run: () => Promise<SeriesImportResult[]>,
  ): Promise<void> {
    try {
      result.series.push(...(await run()));
    } catch (error) {
      const message = `${label}: ${describeError(error)}`;
      console.error(`[Statistics] Import failed for ${message}`);
      result.errors.push(message);
      result.success = false;
    }
  }

  console.log(
    `[Statistics] Importing: ${snapshot.refreshed.amiUsages.size} AMI meters, ${snapshot.refreshed.intervalReads.size} interval meters, mode=${mode}`,
  );

  // Hourly and monthly feeds don't change intraday
  if (mode !== RefreshMode.INTERVAL_ONLY) {
    for (const [servicePoint, readings] of snapshot.amiUsages) {
      if (!snapshot.refreshed.amiUsages.has(servicePoint)) continue;
      const meterData = snapshot.meters.get(servicePoint);
      if (!meterData) continue;

      await step(`hourly ${servicePoint}`, () =>
        reconcileHourly(
          store,
          servicePoint,
          readings,
          meterData.meter.fuelType,
          mode,
          { gasConversion: options.gasConversion },
        ),
      );
    }

    for (const [accountId, usages] of snapshot.usages) {
      if (!snapshot.refreshed.usages.has(accountId)) continue;
      await step(`monthly usage ${accountId}`, () =>
        reconcileMonthlyUsage(store, accountId, usages),
      );
    }
    for (const [accountId, costs] of snapshot.costs) {
      if (!snapshot.refreshed.costs.has(accountId)) continue;
      await step(`monthly cost ${accountId}`, () =>
        reconcileMonthlyCosts(store, accountId, costs),
      );
    }
  }

  for (const [servicePoint, reads] of snapshot.intervalReads) {
    if (!snapshot.refreshed.intervalReads.has(servicePoint)) continue;
    await step(`interval ${servicePoint}`, () =>
      reconcileInterval(store, servicePoint, reads, now),
    );
  }

  result.durationMs = Date.now() - startTime;
  const written = result.series.reduce((n, s) => n + s.numPoints, 0);
  console.log(
    `[Statistics] Import complete: ${written} points across ${result.series.length} series in ${result.durationMs}ms`,
  );
  return result;
}
