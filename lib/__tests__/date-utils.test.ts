import { describe, it, expect } from "@jest/globals";
import { CalendarDate } from "@internationalized/date";
import {
  formatDateISO,
  formatDateTimeUTC,
  formatTimeUTC,
  formatUsagePeriod,
  getNextMinuteBoundary,
  getTodayUtc,
  getYesterdayMidnightUtc,
  monthStartUtc,
  parseDateISO,
  parseUtcTimestamp,
  toYearMonth,
  truncateToHour,
} from "../date-utils";
import { ValidationFailure } from "../errors";

describe("date-utils", () => {
  describe("formatDateISO / parseDateISO", () => {
    it("should zero-pad month and day", () => {
      expect(formatDateISO(new CalendarDate(2025, 8, 7))).toBe("2025-08-07");
    });

    it("should parse a YYYY-MM-DD string", () => {
      const date = parseDateISO("2025-08-17");
      expect(date.year).toBe(2025);
      expect(date.month).toBe(8);
      expect(date.day).toBe(17);
    });
  });

  describe("parseUtcTimestamp", () => {
    it("should parse a Z timestamp with fractional seconds", () => {
      expect(parseUtcTimestamp("2026-01-31T23:00:00.000Z")).toBe(
        Date.UTC(2026, 0, 31, 23),
      );
    });

    it("should treat a timestamp without offset as UTC", () => {
      expect(parseUtcTimestamp("2026-01-31T23:15:00")).toBe(
        Date.UTC(2026, 0, 31, 23, 15),
      );
    });

    it("should accept a space between date and time", () => {
      expect(parseUtcTimestamp("2026-01-31 23:15:00")).toBe(
        Date.UTC(2026, 0, 31, 23, 15),
      );
    });

    it("should read a bare date as UTC midnight", () => {
      expect(parseUtcTimestamp("2025-01-15")).toBe(Date.UTC(2025, 0, 15));
      expect(parseUtcTimestamp(" 2025-01-15 ")).toBe(Date.UTC(2025, 0, 15));
    });

    it("should honour an explicit offset", () => {
      expect(parseUtcTimestamp("2026-01-31T23:00:00-05:00")).toBe(
        Date.UTC(2026, 1, 1, 4),
      );
    });

    it("should return null for empty or missing values", () => {
      expect(parseUtcTimestamp("")).toBeNull();
      expect(parseUtcTimestamp("   ")).toBeNull();
      expect(parseUtcTimestamp(null)).toBeNull();
      expect(parseUtcTimestamp(undefined)).toBeNull();
    });

    it("should return null for garbage", () => {
      expect(parseUtcTimestamp("not a date")).toBeNull();
    });
  });

  describe("truncateToHour", () => {
    it("should drop minutes, seconds and milliseconds", () => {
      expect(truncateToHour(Date.UTC(2025, 0, 15, 10, 47, 12, 345))).toBe(
        Date.UTC(2025, 0, 15, 10),
      );
    });

    it("should leave a top-of-hour timestamp unchanged", () => {
      const ts = Date.UTC(2025, 0, 15, 10);
      expect(truncateToHour(ts)).toBe(ts);
    });
  });

  describe("getTodayUtc / getYesterdayMidnightUtc", () => {
    it("should use the UTC calendar date", () => {
      const today = getTodayUtc(new Date("2025-01-15T23:30:00-05:00"));
      expect(formatDateISO(today)).toBe("2025-01-16");
    });

    it("should cross a month boundary for yesterday", () => {
      expect(getYesterdayMidnightUtc(new Date(Date.UTC(2025, 2, 1, 5)))).toBe(
        Date.UTC(2025, 1, 28),
      );
    });
  });

  describe("toYearMonth / monthStartUtc", () => {
    it("should encode a date's month as YYYYMM", () => {
      expect(toYearMonth(new CalendarDate(2025, 1, 15))).toBe(202501);
    });

    it("should decode YYYYMM to the first instant of the month", () => {
      expect(monthStartUtc(202503, 1990, 2100)).toBe(Date.UTC(2025, 2, 1));
    });

    it.each([202513, 202500, 198912, 210101, 202501.5])(
      "should reject %p",
      (yearMonth) => {
        expect(() => monthStartUtc(yearMonth, 1990, 2100)).toThrow(
          ValidationFailure,
        );
      },
    );
  });

  describe("formatUsagePeriod", () => {
    it("should format YYYYMM as YYYY-MM", () => {
      expect(formatUsagePeriod(202501)).toBe("2025-01");
      expect(formatUsagePeriod(202412)).toBe("2024-12");
    });

    it("should return null for zero or missing values", () => {
      expect(formatUsagePeriod(0)).toBeNull();
      expect(formatUsagePeriod(null)).toBeNull();
    });
  });

  describe("formatDateTimeUTC / formatTimeUTC", () => {
    const ts = Date.UTC(2025, 0, 15, 3, 4, 5);

    it("should format as YYYY-MM-DD HH:MM:SS", () => {
      expect(formatDateTimeUTC(ts)).toBe("2025-01-15 03:04:05");
    });

    it("should format a short log label", () => {
      expect(formatTimeUTC(ts)).toBe("2025-01-15 03:04 UTC");
    });
  });

  describe("getNextMinuteBoundary", () => {
    it("should return the next hour for 60-minute intervals", () => {
      const next = getNextMinuteBoundary(
        60,
        new Date(Date.UTC(2025, 0, 15, 14, 23, 30)),
      );
      expect(next.hour).toBe(15);
      expect(next.minute).toBe(0);
      expect(next.second).toBe(0);
    });

    it("should return :25 when at :23 with 5-minute intervals", () => {
      const next = getNextMinuteBoundary(
        5,
        new Date(Date.UTC(2025, 0, 15, 14, 23, 30)),
      );
      expect(next.hour).toBe(14);
      expect(next.minute).toBe(25);
    });

    it("should always advance when already on a boundary", () => {
      const next = getNextMinuteBoundary(
        60,
        new Date(Date.UTC(2025, 0, 15, 14, 0, 0)),
      );
      expect(next.toDate().getTime()).toBe(Date.UTC(2025, 0, 15, 15));
    });

    it("should roll over to the next day", () => {
      const next = getNextMinuteBoundary(
        60,
        new Date(Date.UTC(2025, 0, 15, 23, 59, 59)),
      );
      expect(next.day).toBe(16);
      expect(next.hour).toBe(0);
    });
  });
});
