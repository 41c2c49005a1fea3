/**
 * Wire types for the utility API and the client interface the coordinator
 * depends on
 */

import type { z } from "zod";
import type { CalendarDate } from "@internationalized/date";
import type {
  AmiEnergyUsageSchema,
  BillingAccountSchema,
  EnergyUsageCostSchema,
  EnergyUsageSchema,
  IntervalReadSchema,
  MeterSchema,
} from "./schemas";

export type Meter = z.infer<typeof MeterSchema>;
export type BillingAccount = z.infer<typeof BillingAccountSchema>;

// Monthly usage; usageYearMonth is YYYYMM, usageType TOTAL_KWH, THERMS, ...
export type EnergyUsage = z.infer<typeof EnergyUsageSchema>;

// Monthly cost in dollars; month is YYYYMM
export type EnergyUsageCost = z.infer<typeof EnergyUsageCostSchema>;

// Hourly smart meter reading; negative quantity means energy returned
export type AmiEnergyUsage = z.infer<typeof AmiEnergyUsageSchema>;

// 15-minute near-real-time read
export type IntervalRead = z.infer<typeof IntervalReadSchema>;

export interface AmiMeterIdentifier {
  meterNumber: string;
  premiseNumber: string;
  servicePointNumber: string;
  meterPointNumber: string;
}

/**
 * Remote utility API. Implementations throw the provider errors from
 * `@/lib/errors`.
 */
export interface UtilityApi {
  fetchBillingAccount(accountId: string): Promise<BillingAccount>;

  fetchEnergyUsages(
    accountId: string,
    fromMonth: number,
  ): Promise<EnergyUsage[]>;

  fetchEnergyUsageCosts(
    accountId: string,
    queryDate: CalendarDate,
    companyCode: string,
  ): Promise<EnergyUsageCost[]>;

  fetchAmiEnergyUsages(
    meter: AmiMeterIdentifier,
    dateFrom: CalendarDate,
    dateTo: CalendarDate,
  ): Promise<AmiEnergyUsage[]>;

  /** @param startTime - "YYYY-MM-DD HH:MM:SS" in UTC */
  fetchIntervalReads(
    premiseNumber: string,
    servicePointNumber: string,
    startTime: string,
  ): Promise<IntervalRead[]>;
}
