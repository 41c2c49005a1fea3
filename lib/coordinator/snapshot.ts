/**
 * Coordinator snapshot: the data one cycle publishes
 *
 * Snapshots are never mutated. Each cycle collects per-account partials and
 * `mergeSnapshot` lays them over the previous snapshot, so accounts, meters
 * and feeds that failed this cycle keep their last good data. `refreshed`
 * names the keys this cycle actually fetched.
 */

import type { Milliseconds } from "@/lib/types/common";
import type {
  AmiEnergyUsage,
  BillingAccount,
  EnergyUsage,
  EnergyUsageCost,
  IntervalRead,
  Meter,
} from "@/lib/utility/types";
import type { RefreshMode } from "./refresh-mode";

export interface MeterData {
  meter: Meter;
  accountId: string;
  billingAccount: BillingAccount;
}

export interface RefreshedKeys {
  accounts: ReadonlySet<string>;
  usages: ReadonlySet<string>;
  costs: ReadonlySet<string>;
  amiUsages: ReadonlySet<string>;
  intervalReads: ReadonlySet<string>;
}

export interface CoordinatorSnapshot {
  readonly mode: RefreshMode;
  readonly fetchedAtMs: Milliseconds;
  readonly accounts: ReadonlyMap<string, BillingAccount>; // by account id
  readonly meters: ReadonlyMap<string, MeterData>; // by service point
  readonly usages: ReadonlyMap<string, readonly EnergyUsage[]>; // by account id
  readonly costs: ReadonlyMap<string, readonly EnergyUsageCost[]>; // by account id
  readonly amiUsages: ReadonlyMap<string, readonly AmiEnergyUsage[]>; // by service point
  readonly intervalReads: ReadonlyMap<string, readonly IntervalRead[]>; // by service point
  readonly refreshed: RefreshedKeys;
}

/**
 * What one account's fetch produced this cycle. A feed that was skipped or
 * failed is left undefined (or absent from the meter maps).
 */
export interface AccountFetchResult {
  accountId: string;
  billingAccount: BillingAccount;
  meters: MeterData[];
  usages?: EnergyUsage[];
  costs?: EnergyUsageCost[];
  amiUsages: Map<string, AmiEnergyUsage[]>;
  intervalReads: Map<string, IntervalRead[]>;
}

export function createEmptySnapshot(
  mode: RefreshMode,
  fetchedAtMs: Milliseconds,
): CoordinatorSnapshot {
  return {
    mode,
    fetchedAtMs,
    accounts: new Map(),
    meters: new Map(),
    usages: new Map(),
    costs: new Map(),
    amiUsages: new Map(),
    intervalReads: new Map(),
    refreshed: {
      accounts: new Set(),
      usages: new Set(),
      costs: new Set(),
      amiUsages: new Set(),
      intervalReads: new Set(),
    },
  };
}

/**
 * Lay this cycle's partials over the previous snapshot
 */
export function mergeSnapshot(
  previous: CoordinatorSnapshot | null,
  partials: readonly AccountFetchResult[],
  mode: RefreshMode,
  fetchedAtMs: Milliseconds,
): CoordinatorSnapshot {
  const base = previous ?? createEmptySnapshot(mode, fetchedAtMs);

  const accounts = new Map(base.accounts);
  const meters = new Map(base.meters);
  const usages = new Map(base.usages);
  const costs = new Map(base.costs);
  const amiUsages = new Map(base.amiUsages);
  const intervalReads = new Map(base.intervalReads);
  const refreshed = {
    accounts: new Set<string>(),
    usages: new Set<string>(),
    costs: new Set<string>(),
    amiUsages: new Set<string>(),
    intervalReads: new Set<string>(),
  };

  for (const partial of partials) {
    accounts.set(partial.accountId, partial.billingAccount);
    refreshed.accounts.add(partial.accountId);

    for (const meterData of partial.meters) {
      meters.set(meterData.meter.servicePointNumber, meterData);
    }
    if (partial.usages) {
      usages.set(partial.accountId, partial.usages);
      refreshed.usages.add(partial.accountId);
    }
    if (partial.costs) {
      costs.set(partial.accountId, partial.costs);
      refreshed.costs.add(partial.accountId);
    }

    for (const [servicePoint, readings] of partial.amiUsages) {
      amiUsages.set(servicePoint, readings);
      refreshed.amiUsages.add(servicePoint);
    }
    for (const [servicePoint, reads] of partial.intervalReads) {
      intervalReads.set(servicePoint, reads);
      refreshed.intervalReads.add(servicePoint);
    }
  }

  return {
    mode,
    fetchedAtMs,
    accounts,
    meters,
    usages,
    costs,
    amiUsages,
    intervalReads,
    refreshed,
  };
}
