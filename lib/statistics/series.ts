/**
 * Series identity: ids, display names and units
 *
 * Ids are `<namespace>:<key>_<fuel/direction tag>_<granularity>`, where key
 * is a service point number (hourly, interval) or an account id (monthly).
 */

import { STATISTICS_CONFIG } from "@/config";
import type { Direction } from "@/lib/types/common";
import type { StatisticMetadata, UnitClass } from "./types";

export type SeriesFuel = "electric" | "gas";

export type Granularity = "hourly" | "interval" | "monthly";

export interface SeriesDescriptor {
  seriesId: string;
  name: string;
  unit: string;
  unitClass: UnitClass;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function seriesId(key: string, tag: string): string {
  return `${STATISTICS_CONFIG.namespace}:${key}_${tag}`;
}

/**
 * Hourly AMI series. Gas has no return series.
 */
export function hourlySeries(
  servicePoint: string,
  fuel: SeriesFuel,
  direction: Direction = "consumption",
): SeriesDescriptor {
  if (fuel === "gas") {
    return {
      seriesId: seriesId(servicePoint, "gas_hourly_usage"),
      name: `${servicePoint} Gas Hourly Usage`,
      unit: STATISTICS_CONFIG.gasUnit,
      unitClass: "volume",
    };
  }

  if (direction === "return") {
    return {
      seriesId: seriesId(servicePoint, "electric_return_hourly_usage"),
      name: `${servicePoint} Electric Return Hourly Usage`,
      unit: STATISTICS_CONFIG.electricUnit,
      unitClass: "energy",
    };
  }

  return {
    seriesId: seriesId(servicePoint, "electric_hourly_usage"),
    name: `${servicePoint} Electric Hourly Usage`,
    unit: STATISTICS_CONFIG.electricUnit,
    unitClass: "energy",
  };
}

/**
 * Interval (15 minute, bucketed hourly) series; electric only
 */
export function intervalSeries(
  servicePoint: string,
  direction: Direction,
): SeriesDescriptor {
  const returnTag = direction === "return" ? "_return" : "";
  const returnName = direction === "return" ? " Return" : "";
  return {
    seriesId: seriesId(servicePoint, `electric_interval${returnTag}_usage`),
    name: `${servicePoint} Electric Interval${returnName} Usage`,
    unit: STATISTICS_CONFIG.electricUnit,
    unitClass: "energy",
  };
}

// Usage types reported by the monthly usage feed
const USAGE_TYPE_SERIES: Record<string, { fuel: SeriesFuel; unit: string }> = {
  TOTAL_KWH: { fuel: "electric", unit: STATISTICS_CONFIG.electricUnit },
  THERMS: { fuel: "gas", unit: "therm" },
};

/**
 * Monthly usage series for a usage type
 * @returns null for usage types without a series
 */
export function monthlyUsageSeries(
  accountId: string,
  usageType: string,
): SeriesDescriptor | null {
  const entry = USAGE_TYPE_SERIES[usageType.toUpperCase()];
  if (!entry) return null;

  return {
    seriesId: seriesId(accountId, `${entry.fuel}_monthly_usage`),
    name: `${accountId} ${capitalize(entry.fuel)} Monthly Usage`,
    unit: entry.unit,
    unitClass: entry.fuel === "gas" ? "volume" : "energy",
  };
}

/**
 * Monthly cost series for a cost record's fuel type ("Electric", "GAS", ...)
 * @returns null for fuel types without a series
 */
export function monthlyCostSeries(
  accountId: string,
  fuelType: string,
): SeriesDescriptor | null {
  const fuel = fuelType.toLowerCase();
  if (fuel !== "electric" && fuel !== "gas") return null;

  return {
    seriesId: seriesId(accountId, `${fuel}_monthly_cost`),
    name: `${accountId} ${capitalize(fuel)} Monthly Cost`,
    unit: STATISTICS_CONFIG.currency,
    unitClass: "monetary",
  };
}

export function toMetadata(series: SeriesDescriptor): StatisticMetadata {
  return {
    ...series,
    source: STATISTICS_CONFIG.source,
    hasSum: true,
    hasMean: false,
  };
}
