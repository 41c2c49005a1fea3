/**
 * Monthly usage and cost import
 *
 * Each record lands on its month's first instant (UTC). No mode-specific
 * baselines: the running sum always continues from the series' last point.
 */

import { STATISTICS_CONFIG } from "@/config";
import { monthStartUtc } from "@/lib/date-utils";
import { ValidationFailure } from "@/lib/errors";
import type { Milliseconds } from "@/lib/types/common";
import type { EnergyUsage, EnergyUsageCost } from "@/lib/utility/types";
import { accumulate } from "./buckets";
import {
  monthlyCostSeries,
  monthlyUsageSeries,
  toMetadata,
  type SeriesDescriptor,
} from "./series";
import {
  ZERO_BASELINE,
  type SeriesImportResult,
  type StatisticsStore,
} from "./types";

interface MonthlyRecord {
  yearMonth: number;
  value: number;
}

interface MonthlyGroup {
  series: SeriesDescriptor;
  records: MonthlyRecord[];
}

/**
 * Sum records into month buckets, dropping out-of-range months (pure)
 */
export function bucketByMonth(records: readonly MonthlyRecord[]): {
  buckets: Map<Milliseconds, number>;
  invalid: number;
} {
  const buckets = new Map<Milliseconds, number>();
  let invalid = 0;

  for (const record of records) {
    let monthStart: Milliseconds;
    try {
      monthStart = monthStartUtc(
        record.yearMonth,
        STATISTICS_CONFIG.minYear,
        STATISTICS_CONFIG.maxYear,
      );
    } catch (error) {
      if (!(error instanceof ValidationFailure)) throw error;
      console.debug(`[Statistics] ${error.message}`);
      invalid++;
      continue;
    }
    if (!Number.isFinite(record.value)) {
      invalid++;
      continue;
    }
    buckets.set(monthStart, (buckets.get(monthStart) ?? 0) + record.value);
  }

  return { buckets, invalid };
}

async function importGroup(
  store: StatisticsStore,
  group: MonthlyGroup,
): Promise<SeriesImportResult> {
  const { series } = group;
  const { buckets, invalid } = bucketByMonth(group.records);
  if (invalid > 0) {
    console.warn(
      `[Statistics] ${series.seriesId}: skipped ${invalid} records with an invalid month or value`,
    );
  }

  const last = await store.getLastStatistic(series.seriesId);
  const baseline = last ? { sum: last.sum, lastMs: last.startMs } : ZERO_BASELINE;
  const { points } = accumulate(buckets, baseline);

  if (points.length === 0) {
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
    `[Statistics] Imported ${points.length} monthly points for ${series.seriesId} (sum=${finalSum.toFixed(2)})`,
  );
  return {
    seriesId: series.seriesId,
    numPoints: points.length,
    finalSum,
    cleared: false,
  };
}

function addToGroup(
  groups: Map<string, MonthlyGroup>,
  series: SeriesDescriptor,
  record: MonthlyRecord,
): void {
  const group = groups.get(series.seriesId);
  if (group) {
    group.records.push(record);
  } else {
    groups.set(series.seriesId, { series, records: [record] });
  }
}

async function importGroups(
  store: StatisticsStore,
  groups: Map<string, MonthlyGroup>,
): Promise<SeriesImportResult[]> {
  const results: SeriesImportResult[] = [];
  for (const group of groups.values()) {
    results.push(await importGroup(store, group));
  }
  return results;
}

export async function reconcileMonthlyUsage(
  store: StatisticsStore,
  accountId: string,
  usages: readonly EnergyUsage[],
): Promise<SeriesImportResult[]> {
  const groups = new Map<string, MonthlyGroup>();

  for (const usage of usages) {
    const series = monthlyUsageSeries(accountId, usage.usageType);
    if (!series) continue;
    addToGroup(groups, series, {
      yearMonth: usage.usageYearMonth,
      value: usage.usage,
    });
  }

  return importGroups(store, groups);
}

export async function reconcileMonthlyCosts(
  store: StatisticsStore,
  accountId: string,
  costs: readonly EnergyUsageCost[],
): Promise<SeriesImportResult[]> {
  const groups = new Map<string, MonthlyGroup>();

  for (const cost of costs) {
    const series = monthlyCostSeries(accountId, cost.fuelType);
    if (!series) continue;
    addToGroup(groups, series, { yearMonth: cost.month, value: cost.amount });
  }

  return importGroups(store, groups);
}
