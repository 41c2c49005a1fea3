/**
 * In-process stand-in for the utility API, plus builders for its records
 */

import type { CalendarDate } from "@internationalized/date";
import { GenericProviderError } from "@/lib/errors";
import type {
  AmiEnergyUsage,
  AmiMeterIdentifier,
  BillingAccount,
  EnergyUsage,
  EnergyUsageCost,
  IntervalRead,
  Meter,
  UtilityApi,
} from "@/lib/utility/types";

export function buildMeter(overrides: Partial<Meter> = {}): Meter {
  return {
    meterNumber: "M-1",
    servicePointNumber: "SP-1",
    meterPointNumber: "MP-1",
    fuelType: "Electric",
    hasAmiSmartMeter: true,
    ...overrides,
  };
}

export function buildAccount(
  accountId: string,
  meters: Meter[],
  overrides: Partial<BillingAccount> = {},
): BillingAccount {
  return {
    billingAccountId: accountId,
    region: "NORTH",
    premiseNumber: `P-${accountId}`,
    meter: { nodes: meters },
    ...overrides,
  };
}

export interface AmiRequest {
  meter: AmiMeterIdentifier;
  dateFrom: string;
  dateTo: string;
}

/**
 * Serves canned data per account and service point. An error registered
 * under a feed key ("account:<id>", "usages:<id>", "costs:<id>",
 * "ami:<servicePoint>", "interval:<servicePoint>") is thrown instead.
 */
export class FakeUtilityApi implements UtilityApi {
  readonly accounts = new Map<string, BillingAccount>();
  readonly usages = new Map<string, EnergyUsage[]>();
  readonly costs = new Map<string, EnergyUsageCost[]>();
  readonly amiUsages = new Map<string, AmiEnergyUsage[]>();
  readonly intervalReads = new Map<string, IntervalRead[]>();
  readonly failures = new Map<string, Error>();

  readonly calls: string[] = [];
  readonly usageRequests: { accountId: string; fromMonth: number }[] = [];
  readonly costRequests: {
    accountId: string;
    queryDate: string;
    companyCode: string;
  }[] = [];
  readonly amiRequests: AmiRequest[] = [];
  readonly intervalRequests: {
    premiseNumber: string;
    servicePointNumber: string;
    startTime: string;
  }[] = [];

  addAccount(account: BillingAccount): void {
    this.accounts.set(account.billingAccountId, account);
  }

  failWith(key: string, error: Error): void {
    this.failures.set(key, error);
  }

  private record(key: string): void {
    this.calls.push(key);
    const failure = this.failures.get(key);
    if (failure) throw failure;
  }

  async fetchBillingAccount(accountId: string): Promise<BillingAccount> {
    this.record(`account:${accountId}`);
    const account = this.accounts.get(accountId);
    if (!account) {
      throw new GenericProviderError("HTTP 404: account not found", 404);
    }
    return account;
  }

  async fetchEnergyUsages(
    accountId: string,
    fromMonth: number,
  ): Promise<EnergyUsage[]> {
    this.record(`usages:${accountId}`);
    this.usageRequests.push({ accountId, fromMonth });
    return this.usages.get(accountId) ?? [];
  }

  async fetchEnergyUsageCosts(
    accountId: string,
    queryDate: CalendarDate,
    companyCode: string,
  ): Promise<EnergyUsageCost[]> {
    this.record(`costs:${accountId}`);
    this.costRequests.push({
      accountId,
      queryDate: queryDate.toString(),
      companyCode,
    });
    return this.costs.get(accountId) ?? [];
  }

  async fetchAmiEnergyUsages(
    meter: AmiMeterIdentifier,
    dateFrom: CalendarDate,
    dateTo: CalendarDate,
  ): Promise<AmiEnergyUsage[]> {
    this.record(`ami:${meter.servicePointNumber}`);
    this.amiRequests.push({
      meter,
      dateFrom: dateFrom.toString(),
      dateTo: dateTo.toString(),
    });
    return this.amiUsages.get(meter.servicePointNumber) ?? [];
  }

  async fetchIntervalReads(
    premiseNumber: string,
    servicePointNumber: string,
    startTime: string,
  ): Promise<IntervalRead[]> {
    this.record(`interval:${servicePointNumber}`);
    this.intervalRequests.push({ premiseNumber, servicePointNumber, startTime });
    return this.intervalReads.get(servicePointNumber) ?? [];
  }
}
