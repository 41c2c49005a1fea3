import { describe, it, expect } from "@jest/globals";
import {
  hourlySeries,
  intervalSeries,
  monthlyCostSeries,
  monthlyUsageSeries,
  toMetadata,
} from "../series";
import {
  getGasConversion,
  identityGasConversion,
  THERM_TO_CCF,
  thermsToCcfConversion,
} from "../conversions";

describe("series identity", () => {
  it("should name hourly series by service point", () => {
    expect(hourlySeries("77", "electric").seriesId).toBe(
      "usage_ledger:77_electric_hourly_usage",
    );
    expect(hourlySeries("77", "electric", "return").seriesId).toBe(
      "usage_ledger:77_electric_return_hourly_usage",
    );
    expect(hourlySeries("77", "gas", "return").seriesId).toBe(
      "usage_ledger:77_gas_hourly_usage",
    );
  });

  it("should name interval series by service point", () => {
    expect(intervalSeries("77", "consumption")).toEqual({
      seriesId: "usage_ledger:77_electric_interval_usage",
      name: "77 Electric Interval Usage",
      unit: "kWh",
      unitClass: "energy",
    });
    expect(intervalSeries("77", "return").name).toBe(
      "77 Electric Interval Return Usage",
    );
  });

  it("should map monthly usage types and ignore unknown ones", () => {
    expect(monthlyUsageSeries("9", "TOTAL_KWH")?.seriesId).toBe(
      "usage_ledger:9_electric_monthly_usage",
    );
    expect(monthlyUsageSeries("9", "therms")?.unit).toBe("therm");
    expect(monthlyUsageSeries("9", "ON_PEAK_KWH")).toBeNull();
  });

  it("should map cost fuel types and ignore unknown ones", () => {
    expect(monthlyCostSeries("9", "GAS")?.seriesId).toBe(
      "usage_ledger:9_gas_monthly_cost",
    );
    expect(monthlyCostSeries("9", "Water")).toBeNull();
  });

  it("should describe every series as a sum-only statistic", () => {
    expect(toMetadata(hourlySeries("9", "gas"))).toEqual({
      seriesId: "usage_ledger:9_gas_hourly_usage",
      name: "9 Gas Hourly Usage",
      unit: "CCF",
      unitClass: "volume",
      source: "usage_ledger",
      hasSum: true,
      hasMean: false,
    });
  });
});

describe("gas conversions", () => {
  it("should leave quantities unchanged by default", () => {
    expect(getGasConversion("none")).toBe(identityGasConversion);
    expect(identityGasConversion.convert(3.5)).toBe(3.5);
  });

  it("should convert therms to CCF", () => {
    expect(getGasConversion("therms_to_ccf")).toBe(thermsToCcfConversion);
    expect(thermsToCcfConversion.convert(10)).toBeCloseTo(10 * THERM_TO_CCF, 10);
    expect(thermsToCcfConversion.convert(1)).toBe(1.038);
  });
});
