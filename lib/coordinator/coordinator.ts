/**
 * Fetch coordinator
 *
 * Runs one fetch cycle per call and publishes an immutable snapshot for the
 * statistics import. Account-level provider errors skip that account; feed
 * errors skip that feed; authentication failures abort the cycle.
 */

import { ACCOUNT_IDS, ERROR_MESSAGES, SYNC_CONFIG } from "@/config";
import { fromDate } from "@internationalized/date";
import { formatUsagePeriod } from "@/lib/date-utils";
import {
  describeError,
  isAuthenticationFailure,
  isRecoverableFeedError,
  isRecoverableProviderError,
  ValidationFailure,
} from "@/lib/errors";
import { asMilliseconds, type FuelType } from "@/lib/types/common";
import type {
  AmiEnergyUsage,
  AmiMeterIdentifier,
  EnergyUsage,
  EnergyUsageCost,
  UtilityApi,
} from "@/lib/utility/types";
import {
  computeFetchWindows,
  RefreshMode,
  type FetchWindows,
} from "./refresh-mode";
import {
  mergeSnapshot,
  type AccountFetchResult,
  type CoordinatorSnapshot,
  type MeterData,
} from "./snapshot";

export type RefreshTrigger = "scheduled" | "manual";

export interface AccountFailure {
  accountId: string;
  error: string;
}

export interface CycleResult {
  success: boolean;
  mode: RefreshMode;
  snapshot: CoordinatorSnapshot | null; // published snapshot, null if discarded
  accountsFetched: string[];
  accountsFailed: AccountFailure[];
  feedErrors: string[];
  error?: string;
  durationMs: number;
}

export interface FetchCoordinatorOptions {
  api: UtilityApi;
  accountIds?: readonly string[];
  clock?: () => Date;
  /** Start in incremental mode, e.g. when the store already holds history */
  skipFirstRefresh?: boolean;
}

// Monthly usage types by meter fuel type
const USAGE_TYPE_BY_FUEL: Record<string, string> = {
  Electric: "TOTAL_KWH",
  Gas: "THERMS",
};

function usageTypeFor(fuelType: string): string {
  return USAGE_TYPE_BY_FUEL[fuelType] ?? fuelType.toUpperCase();
}

function costMatchesFuel(cost: EnergyUsageCost, fuelType: string): boolean {
  return cost.fuelType === fuelType || cost.fuelType === fuelType.toUpperCase();
}

export class FetchCoordinator {
  private readonly api: UtilityApi;
  private readonly clock: () => Date;
  private accountIds: readonly string[];
  private snapshot: CoordinatorSnapshot | null = null;
  private firstRefreshPending: boolean;
  private lastCycleSucceeded = true;

  constructor(options: FetchCoordinatorOptions) {
    this.api = options.api;
    this.accountIds = options.accountIds ?? ACCOUNT_IDS;
    this.clock = options.clock ?? (() => new Date());
    this.firstRefreshPending = !options.skipFirstRefresh;
  }

  /** Last published snapshot */
  get data(): CoordinatorSnapshot | null {
    return this.snapshot;
  }

  get isFirstRefresh(): boolean {
    return this.firstRefreshPending;
  }

  get selectedAccounts(): readonly string[] {
    return this.accountIds;
  }

  setSelectedAccounts(accountIds: readonly string[]): void {
    this.accountIds = [...accountIds];
  }

  /**
   * Make the next cycle a full historical import
   */
  resetToFirstRefresh(): void {
    console.log(
      "[Coordinator] Resetting to first refresh for a full historical import",
    );
    this.firstRefreshPending = true;
  }

  /**
   * Mode for the next cycle. Scheduled ticks at the midnight hour run the
   * midnight refresh; other scheduled ticks fetch interval reads only.
   */
  nextMode(trigger: RefreshTrigger, now: Date = this.clock()): RefreshMode {
    if (this.firstRefreshPending) return RefreshMode.FIRST;
    if (trigger === "manual") return RefreshMode.INCREMENTAL;

    const hourUtc = fromDate(now, "UTC").hour;
    return hourUtc === SYNC_CONFIG.midnightHourUtc
      ? RefreshMode.MIDNIGHT
      : RefreshMode.INTERVAL_ONLY;
  }

  /**
   * Fetch every selected account and publish the merged snapshot
   *
   * @param accountIds - fetch only these accounts this cycle
   * @throws AuthenticationFailure when credentials are rejected; nothing is
   * published and the first-refresh flag is kept
   */
  async runCycle(
    mode: RefreshMode,
    accountIds: readonly string[] = this.accountIds,
  ): Promise<CycleResult> {
    const startTime = Date.now();
    const now = this.clock();
    const windows = computeFetchWindows(mode, now);

    const result: CycleResult = {
      success: false,
      mode,
      snapshot: null,
      accountsFetched: [],
      accountsFailed: [],
      feedErrors: [],
      durationMs: 0,
    };

    if (accountIds.length === 0) {
      console.warn(`[Coordinator] ${ERROR_MESSAGES.NO_ACCOUNTS}`);
      result.error = ERROR_MESSAGES.NO_ACCOUNTS;
      result.durationMs = Date.now() - startTime;
      return result;
    }

    console.log(
      `[Coordinator] ${mode} refresh started for ${accountIds.length} account(s)`,
    );
    if (windows.usageFromMonth !== null) {
      console.debug(
        `[Coordinator] Fetching usages from month ${windows.usageFromMonth}`,
      );
    }

    const partials: AccountFetchResult[] = [];

    for (const accountId of accountIds) {
      try {
        partials.push(
          await this.fetchAccount(accountId, windows, result.feedErrors),
        );
        result.accountsFetched.push(accountId);
      } catch (error) {
        if (isAuthenticationFailure(error)) {
          console.error(
            `[Coordinator] Authentication failed during ${mode} refresh: ${error.message}`,
          );
          throw error;
        }
        if (
          !isRecoverableProviderError(error) &&
          !(error instanceof ValidationFailure)
        ) {
          throw error;
        }
        console.warn(
          `[Coordinator] Error fetching data for account ${accountId}: ${describeError(error)}`,
        );
        result.accountsFailed.push({ accountId, error: describeError(error) });
      }
    }

    if (partials.length === 0) {
      if (this.lastCycleSucceeded) {
        console.warn(
          `[Coordinator] ${ERROR_MESSAGES.API_UNAVAILABLE} Keeping previous data.`,
        );
      }
      this.lastCycleSucceeded = false;
      result.error = ERROR_MESSAGES.API_UNAVAILABLE;
      result.durationMs = Date.now() - startTime;
      return result;
    }

    if (!this.lastCycleSucceeded) {
      console.log("[Coordinator] Utility API recovered");
    }
    this.lastCycleSucceeded = true;

    this.snapshot = mergeSnapshot(
      this.snapshot,
      partials,
      mode,
      asMilliseconds(now.getTime()),
    );

    if (mode === RefreshMode.FIRST && this.firstRefreshPending) {
      this.firstRefreshPending = false;
      console.log(
        "[Coordinator] First refresh complete, switching to incremental updates",
      );
    }

    const amiCount = partials.reduce(
      (total, partial) =>
        total +
        [...partial.amiUsages.values()].reduce((n, r) => n + r.length, 0),
      0,
    );
    const intervalCount = partials.reduce(
      (total, partial) =>
        total +
        [...partial.intervalReads.values()].reduce((n, r) => n + r.length, 0),
      0,
    );
    console.log(
      `[Coordinator] ${mode} refresh complete: ${amiCount} AMI readings, ${intervalCount} interval reads`,
    );

    result.success = true;
    result.snapshot = this.snapshot;
    result.durationMs = Date.now() - startTime;
    return result;
  }

  private async fetchAccount(
    accountId: string,
    windows: FetchWindows,
    feedErrors: string[],
  ): Promise<AccountFetchResult> {
    const billingAccount = await this.api.fetchBillingAccount(accountId);
    const meterNodes = billingAccount.meter.nodes;

    console.debug(
      `[Coordinator] Billing account ${accountId}: region=${billingAccount.region ?? "none"}, meters=${meterNodes.length}`,
    );

    const partial: AccountFetchResult = {
      accountId,
      billingAccount,
      meters: [],
      amiUsages: new Map(),
      intervalReads: new Map(),
    };

    for (const meter of meterNodes) {
      if (!meter.servicePointNumber) continue;
      partial.meters.push({ meter, accountId, billingAccount });
    }

    if (windows.usageFromMonth !== null) {
      const fromMonth = windows.usageFromMonth;
      partial.usages = await this.fetchFeed(
        `usages for account ${accountId}`,
        feedErrors,
        () => this.api.fetchEnergyUsages(accountId, fromMonth),
      );
      if (partial.usages) {
        const latest = Math.max(
          0,
          ...partial.usages.map((usage) => usage.usageYearMonth),
        );
        console.debug(
          `[Coordinator] Fetched ${partial.usages.length} usage records for account ${accountId} (latest ${formatUsagePeriod(latest) ?? "none"})`,
        );
      }

      const region = billingAccount.region;
      if (region) {
        partial.costs = await this.fetchFeed(
          `costs for account ${accountId}`,
          feedErrors,
          () =>
            this.api.fetchEnergyUsageCosts(accountId, windows.today, region),
        );
      } else {
        console.debug(
          `[Coordinator] No region for account ${accountId}, skipping costs`,
        );
        partial.costs = [];
      }
    }

    for (const { meter } of partial.meters) {
      if (!meter.hasAmiSmartMeter) continue;
      const servicePoint = meter.servicePointNumber;

      const ami = windows.ami;
      if (ami) {
        const identifier: AmiMeterIdentifier = {
          meterNumber: meter.meterNumber,
          premiseNumber: billingAccount.premiseNumber,
          servicePointNumber: servicePoint,
          meterPointNumber: meter.meterPointNumber,
        };
        const readings = await this.fetchFeed(
          `AMI usages for meter ${servicePoint}`,
          feedErrors,
          () => this.api.fetchAmiEnergyUsages(identifier, ami.from, ami.to),
        );
        if (readings) {
          partial.amiUsages.set(servicePoint, readings);
          console.log(
            `[Coordinator] Fetched ${readings.length} AMI readings for meter ${servicePoint}`,
          );
        }
      }

      // No interval feed for gas
      if (meter.fuelType === "Gas") continue;

      const reads = await this.fetchFeed(
        `interval reads for meter ${servicePoint}`,
        feedErrors,
        () =>
          this.api.fetchIntervalReads(
            billingAccount.premiseNumber,
            servicePoint,
            windows.intervalStart,
          ),
      );
      if (reads) {
        partial.intervalReads.set(servicePoint, reads);
        console.debug(
          `[Coordinator] Fetched ${reads.length} interval reads for meter ${servicePoint}`,
        );
      }
    }

    return partial;
  }

  /**
   * Run one feed fetch. Recoverable errors are recorded and yield undefined
   * so the feed keeps its previous data.
   */
  private async fetchFeed<T>(
    label: string,
    feedErrors: string[],
    fetcher: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await fetcher();
    } catch (error) {
      if (isAuthenticationFailure(error) || !isRecoverableFeedError(error)) {
        throw error;
      }
      const message = `Could not fetch ${label}: ${describeError(error)}`;
      console.warn(`[Coordinator] ${message}`);
      feedErrors.push(message);
      return undefined;
    }
  }

  getMeterData(servicePoint: string): MeterData | null {
    return this.snapshot?.meters.get(servicePoint) ?? null;
  }

  /**
   * All usages for an account, optionally for one meter fuel type
   */
  getAllUsages(accountId: string, fuelType?: FuelType | string): EnergyUsage[] {
    const usages = this.snapshot?.usages.get(accountId) ?? [];
    if (!fuelType) return [...usages];

    const usageType = usageTypeFor(fuelType);
    return usages.filter((usage) => usage.usageType === usageType);
  }

  /**
   * Most recent usage (highest usageYearMonth)
   */
  getLatestUsage(
    accountId: string,
    fuelType?: FuelType | string,
  ): EnergyUsage | null {
    const usages = this.getAllUsages(accountId, fuelType);
    if (usages.length === 0) return null;
    return usages.reduce((latest, usage) =>
      usage.usageYearMonth > latest.usageYearMonth ? usage : latest,
    );
  }

  getAllCosts(
    accountId: string,
    fuelType?: FuelType | string,
  ): EnergyUsageCost[] {
    const costs = this.snapshot?.costs.get(accountId) ?? [];
    if (!fuelType) return [...costs];
    return costs.filter((cost) => costMatchesFuel(cost, fuelType));
  }

  getLatestCost(
    accountId: string,
    fuelType?: FuelType | string,
  ): EnergyUsageCost | null {
    const costs = this.getAllCosts(accountId, fuelType);
    if (costs.length === 0) return null;
    return costs.reduce((latest, cost) =>
      cost.month > latest.month ? cost : latest,
    );
  }

  getLatestAmiUsage(servicePoint: string): AmiEnergyUsage | null {
    const readings = this.snapshot?.amiUsages.get(servicePoint) ?? [];
    if (readings.length === 0) return null;
    return readings.reduce((latest, reading) =>
      reading.date > latest.date ? reading : latest,
    );
  }
}
