import type { CalendarDate } from "@internationalized/date";
import { SYNC_CONFIG } from "@/config";
import { formatDateTimeUTC, getTodayUtc, toYearMonth } from "@/lib/date-utils";

/**
 * Refresh modes, one per cycle
 */
export enum RefreshMode {
  // Maximal history; once per lifetime or after a reset
  FIRST = "first",
  // Daily; trailing AMI window re-imported from a sum before the window
  MIDNIGHT = "midnight",
  // Other scheduled ticks; interval reads only
  INTERVAL_ONLY = "interval_only",
  // Manual refreshes once the first refresh has completed
  INCREMENTAL = "incremental",
}

export function isRefreshMode(value: string): value is RefreshMode {
  return Object.values<string>(RefreshMode).includes(value);
}

export interface FetchWindows {
  today: CalendarDate;
  /** YYYYMM; null when monthly usage and cost are skipped */
  usageFromMonth: number | null;
  /** null when AMI readings are skipped */
  ami: { from: CalendarDate; to: CalendarDate } | null;
  /** "YYYY-MM-DD HH:MM:SS" UTC */
  intervalStart: string;
}

/**
 * Work out what each feed should request for a cycle in `mode`
 */
export function computeFetchWindows(mode: RefreshMode, now: Date): FetchWindows {
  const today = getTodayUtc(now);
  const intervalStart = formatDateTimeUTC(
    now.getTime() - SYNC_CONFIG.intervalLookbackHours * 60 * 60 * 1000,
  );

  if (mode === RefreshMode.INTERVAL_ONLY) {
    return { today, usageFromMonth: null, ami: null, intervalStart };
  }

  if (mode === RefreshMode.FIRST) {
    return {
      today,
      usageFromMonth: toYearMonth(
        today.subtract({ days: SYNC_CONFIG.firstRefreshUsageDays }),
      ),
      ami: {
        from: today.subtract({ days: SYNC_CONFIG.firstRefreshAmiDays }),
        to: today,
      },
      intervalStart,
    };
  }

  // Same month one year back
  return {
    today,
    usageFromMonth: (today.year - 1) * 100 + today.month,
    ami: {
      from: today.subtract({ days: SYNC_CONFIG.amiTrailingDays }),
      to: today,
    },
    intervalStart,
  };
}
