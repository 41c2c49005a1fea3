import {
  parseAbsolute,
  parseDate,
  toCalendarDate,
  toCalendarDateTime,
  toZoned,
  CalendarDate,
  ZonedDateTime,
  fromDate,
} from "@internationalized/date";
import { asMilliseconds, type Milliseconds } from "@/lib/types/common";
import { ValidationFailure } from "@/lib/errors";

const MS_PER_HOUR = 60 * 60 * 1000;

// Trailing UTC offset ("Z", "+05:00", "-0500")
const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a CalendarDate to YYYY-MM-DD string
 * @param date - CalendarDate object
 * @returns Date string in YYYY-MM-DD format
 */
export function formatDateISO(date: CalendarDate): string {
  const year = String(date.year).padStart(4, "0");
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");

  return `${year}-${month}-${day}`;
}

/**
 * Parse a YYYY-MM-DD string to CalendarDate
 * @param dateStr - Date string in YYYY-MM-DD format (e.g., "2025-08-17")
 * @returns CalendarDate object
 */
export function parseDateISO(dateStr: string): CalendarDate {
  return parseDate(dateStr);
}

/**
 * Parse an upstream timestamp into epoch milliseconds.
 *
 * Accepts "2026-01-31T23:00:00.000Z", "2026-01-31T23:00:00-05:00" and
 * "2026-01-31 23:00:00". Strings without an offset are treated as UTC; a
 * bare date ("2026-01-31") is its UTC midnight.
 *
 * @returns null when the value is empty or cannot be parsed
 */
export function parseUtcTimestamp(
  value: string | null | undefined,
): Milliseconds | null {
  if (!value) return null;

  let trimmed = value.trim().replace(" ", "T");
  if (trimmed === "") return null;
  if (DATE_ONLY.test(trimmed)) trimmed = `${trimmed}T00:00:00`;

  const withOffset = OFFSET_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`;

  try {
    return asMilliseconds(parseAbsolute(withOffset, "UTC").toDate().getTime());
  } catch {
    return null;
  }
}

/**
 * Truncate a timestamp down to the top of its UTC hour
 */
export function truncateToHour(timeMs: number): Milliseconds {
  return asMilliseconds(Math.floor(timeMs / MS_PER_HOUR) * MS_PER_HOUR);
}

/**
 * Get today's date in UTC
 */
export function getTodayUtc(now: Date): CalendarDate {
  return toCalendarDate(fromDate(now, "UTC"));
}

/**
 * Midnight UTC at the start of the given calendar date
 */
export function startOfDayUtc(date: CalendarDate): Milliseconds {
  return asMilliseconds(
    toZoned(toCalendarDateTime(date), "UTC").toDate().getTime(),
  );
}

/**
 * Midnight UTC at the start of yesterday, relative to `now`
 */
export function getYesterdayMidnightUtc(now: Date): Milliseconds {
  return startOfDayUtc(getTodayUtc(now).subtract({ days: 1 }));
}

/**
 * Encode a calendar date's month as a YYYYMM integer (e.g. 202501)
 */
export function toYearMonth(date: CalendarDate): number {
  return date.year * 100 + date.month;
}

/**
 * Decode a YYYYMM integer into the UTC instant the month starts at
 * @throws ValidationFailure when the year or month is out of range
 */
export function monthStartUtc(
  yearMonth: number,
  minYear: number,
  maxYear: number,
): Milliseconds {
  if (!Number.isInteger(yearMonth)) {
    throw new ValidationFailure(`Invalid year-month: ${yearMonth}`, yearMonth);
  }

  const year = Math.floor(yearMonth / 100);
  const month = yearMonth % 100;

  if (year < minYear || year > maxYear) {
    throw new ValidationFailure(
      `Year ${year} outside [${minYear}, ${maxYear}] in ${yearMonth}`,
      yearMonth,
    );
  }
  if (month < 1 || month > 12) {
    throw new ValidationFailure(
      `Month ${month} outside [1, 12] in ${yearMonth}`,
      yearMonth,
    );
  }

  return startOfDayUtc(new CalendarDate(year, month, 1));
}

/**
 * Format a YYYYMM integer as "YYYY-MM"
 * @returns null for a zero or missing value
 */
export function formatUsagePeriod(
  yearMonth: number | null | undefined,
): string | null {
  if (!yearMonth) return null;
  const year = Math.floor(yearMonth / 100);
  const month = yearMonth % 100;
  return `${year}-${String(month).padStart(2, "0")}`;
}

/**
 * Format as "YYYY-MM-DD HH:MM:SS" in UTC, the form the interval-read
 * endpoint takes for its start time
 */
export function formatDateTimeUTC(timeMs: number): string {
  const zoned = fromDate(new Date(timeMs), "UTC");
  const date = formatDateISO(toCalendarDate(zoned));
  const hour = String(zoned.hour).padStart(2, "0");
  const minute = String(zoned.minute).padStart(2, "0");
  const second = String(zoned.second).padStart(2, "0");

  return `${date} ${hour}:${minute}:${second}`;
}

/**
 * Short UTC label for log lines, e.g. "2025-01-15 10:00 UTC"
 */
export function formatTimeUTC(timeMs: number): string {
  return `${formatDateTimeUTC(timeMs).slice(0, 16)} UTC`;
}

/**
 * Calculate the next time at a specific minute boundary (UTC)
 * @param intervalMinutes - The interval in minutes (e.g., 1, 5, 15, 30, 60)
 * @param baseTime - Base time to calculate from
 * @returns ZonedDateTime for the next boundary
 *
 * Examples:
 * - intervalMinutes=5: Returns next 5-minute boundary (:00, :05, :10, etc.)
 * - intervalMinutes=60: Returns next hour (:00:00)
 */
export function getNextMinuteBoundary(
  intervalMinutes: number,
  baseTime: Date,
): ZonedDateTime {
  const intervalMs = intervalMinutes * 60 * 1000;

  // Always advance to the next boundary
  const periods = Math.floor(baseTime.getTime() / intervalMs);
  const nextMs = (periods + 1) * intervalMs;

  return fromDate(new Date(nextMs), "UTC");
}
