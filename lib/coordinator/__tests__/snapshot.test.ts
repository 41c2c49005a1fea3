import { describe, it, expect } from "@jest/globals";
import { buildAccount, buildMeter } from "@/lib/__tests__/utility-test-helper";
import { asMilliseconds } from "@/lib/types/common";
import { RefreshMode } from "../refresh-mode";
import {
  createEmptySnapshot,
  mergeSnapshot,
  type AccountFetchResult,
} from "../snapshot";

const AT = asMilliseconds(Date.UTC(2025, 0, 15, 14));

function partial(
  accountId: string,
  servicePoint: string,
  overrides: Partial<AccountFetchResult> = {},
): AccountFetchResult {
  const meter = buildMeter({ servicePointNumber: servicePoint });
  const billingAccount = buildAccount(accountId, [meter]);
  return {
    accountId,
    billingAccount,
    meters: [{ meter, accountId, billingAccount }],
    amiUsages: new Map(),
    intervalReads: new Map(),
    ...overrides,
  };
}

describe("mergeSnapshot", () => {
  it("should start from an empty snapshot", () => {
    const empty = createEmptySnapshot(RefreshMode.FIRST, AT);
    expect(empty.accounts.size).toBe(0);
    expect(empty.refreshed.accounts.size).toBe(0);

    const merged = mergeSnapshot(
      null,
      [
        partial("A1", "SP1", {
          usages: [{ usageYearMonth: 202501, usageType: "TOTAL_KWH", usage: 1 }],
          amiUsages: new Map([["SP1", [{ date: "2025-01-15T10:00:00Z", quantity: 1 }]]]),
        }),
      ],
      RefreshMode.FIRST,
      AT,
    );

    expect(merged.mode).toBe(RefreshMode.FIRST);
    expect(merged.fetchedAtMs).toBe(AT);
    expect([...merged.accounts.keys()]).toEqual(["A1"]);
    expect([...merged.meters.keys()]).toEqual(["SP1"]);
    expect([...merged.refreshed.usages]).toEqual(["A1"]);
    expect([...merged.refreshed.costs]).toEqual([]);
    expect([...merged.refreshed.amiUsages]).toEqual(["SP1"]);
  });

  it("should keep previous data for feeds that were not fetched", () => {
    const first = mergeSnapshot(
      null,
      [
        partial("A1", "SP1", {
          costs: [{ month: 202412, fuelType: "ELECTRIC", amount: 50 }],
          intervalReads: new Map([["SP1", [{ startTime: "2025-01-15 09:00:00", value: 1 }]]]),
        }),
      ],
      RefreshMode.FIRST,
      AT,
    );
    const second = mergeSnapshot(
      first,
      [partial("A1", "SP1")],
      RefreshMode.INTERVAL_ONLY,
      asMilliseconds(AT + 3_600_000),
    );

    expect(second.costs.get("A1")).toEqual([
      { month: 202412, fuelType: "ELECTRIC", amount: 50 },
    ]);
    expect(second.intervalReads.get("SP1")).toHaveLength(1);
    expect(second.refreshed.costs.size).toBe(0);
    expect(second.refreshed.intervalReads.size).toBe(0);
    expect([...second.refreshed.accounts]).toEqual(["A1"]);
  });

  it("should not mutate the previous snapshot", () => {
    const first = mergeSnapshot(null, [partial("A1", "SP1")], RefreshMode.FIRST, AT);
    mergeSnapshot(first, [partial("A2", "SP2")], RefreshMode.INCREMENTAL, AT);

    expect([...first.accounts.keys()]).toEqual(["A1"]);
    expect([...first.meters.keys()]).toEqual(["SP1"]);
  });
});
