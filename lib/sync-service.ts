/**
 * Sync service: fetch cycle followed by statistics import, on a schedule
 */

import { ERROR_MESSAGES, SYNC_CONFIG } from "@/config";
import type {
  CycleResult,
  FetchCoordinator,
  RefreshTrigger,
} from "@/lib/coordinator/coordinator";
import type { RefreshMode } from "@/lib/coordinator/refresh-mode";
import { formatTimeUTC, getNextMinuteBoundary } from "@/lib/date-utils";
import { describeError, isAuthenticationFailure } from "@/lib/errors";
import {
  importAllStatistics,
  type ImportOptions,
} from "@/lib/statistics/reconciler";
import type { ImportResult, StatisticsStore } from "@/lib/statistics/types";

export interface SyncRunResult {
  success: boolean;
  trigger: RefreshTrigger;
  mode: RefreshMode;
  cycle: CycleResult;
  import: ImportResult | null; // null when the cycle published nothing
  durationMs: number;
}

export interface SyncServiceOptions {
  coordinator: FetchCoordinator;
  store: StatisticsStore;
  clock?: () => Date;
  importOptions?: Omit<ImportOptions, "now">;
  intervalMinutes?: number;
}

export class SyncService {
  private readonly coordinator: FetchCoordinator;
  private readonly store: StatisticsStore;
  private readonly clock: () => Date;
  private readonly importOptions: Omit<ImportOptions, "now">;
  private readonly intervalMinutes: number;

  private timeoutId?: NodeJS.Timeout;
  private isRunning = false;
  private queue: Promise<unknown> = Promise.resolve();
  private lastRun?: SyncRunResult;

  constructor(options: SyncServiceOptions) {
    this.coordinator = options.coordinator;
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.importOptions = options.importOptions ?? {};
    this.intervalMinutes =
      options.intervalMinutes ?? SYNC_CONFIG.scheduleIntervalMinutes;
  }

  get running(): boolean {
    return this.isRunning;
  }

  get lastResult(): SyncRunResult | undefined {
    return this.lastRun;
  }

  /**
   * Queue one cycle plus import. Cycles never overlap.
   *
   * @param mode - overrides the mode the coordinator would pick
   * @throws AuthenticationFailure from the fetch cycle
   */
  runOnce(
    trigger: RefreshTrigger,
    mode?: RefreshMode,
    accountIds?: readonly string[],
  ): Promise<SyncRunResult> {
    const run = this.queue.then(() => this.execute(trigger, mode, accountIds));
    // Keep the queue alive after a failed run
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Reset to a first refresh and run it now, optionally for a subset of
   * accounts
   */
  forceFullResync(accountIds?: readonly string[]): Promise<SyncRunResult> {
    const targets =
      accountIds && accountIds.length > 0 ? accountIds : undefined;
    console.log(
      `[SyncService] Full resync requested for ${targets ? targets.join(", ") : "all accounts"}`,
    );
    this.coordinator.resetToFirstRefresh();
    return this.runOnce("manual", undefined, targets);
  }

  private async execute(
    trigger: RefreshTrigger,
    modeOverride: RefreshMode | undefined,
    accountIds: readonly string[] | undefined,
  ): Promise<SyncRunResult> {
    const startTime = Date.now();
    const now = this.clock();
    const mode = modeOverride ?? this.coordinator.nextMode(trigger, now);

    console.log(
      `[SyncService] ${trigger} run at ${formatTimeUTC(now.getTime())}, mode=${mode}`,
    );

    const cycle = await this.coordinator.runCycle(mode, accountIds);

    let importResult: ImportResult | null = null;
    if (cycle.success && cycle.snapshot) {
      importResult = await importAllStatistics(cycle.snapshot, this.store, {
        ...this.importOptions,
        now,
      });
    } else {
      console.warn(
        `[SyncService] Cycle published nothing: ${cycle.error ?? "unknown error"}`,
      );
    }

    const result: SyncRunResult = {
      success: cycle.success && (importResult?.success ?? false),
      trigger,
      mode,
      cycle,
      import: importResult,
      durationMs: Date.now() - startTime,
    };
    this.lastRun = result;
    return result;
  }

  /**
   * Start scheduled runs on interval boundaries. The first run happens
   * immediately.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      console.log("[SyncService] Already running");
      return;
    }

    console.log(
      `[SyncService] Starting with ${this.intervalMinutes} minute interval`,
    );
    this.isRunning = true;

    await this.tick();
  }

  stop(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = undefined;
    }
    if (this.isRunning) {
      this.isRunning = false;
      console.log("[SyncService] Stopped");
    }
  }

  private async tick(): Promise<void> {
    try {
      const result = await this.runOnce("scheduled");
      if (!result.success) {
        console.warn(
          `[SyncService] Scheduled run finished with errors (mode=${result.mode})`,
        );
      }
    } catch (error) {
      if (isAuthenticationFailure(error)) {
        console.error(`[SyncService] ${ERROR_MESSAGES.AUTH_FAILED} Stopping.`);
        this.stop();
        return;
      }
      console.error(
        `[SyncService] Scheduled run failed: ${describeError(error)}`,
      );
    }

    this.scheduleNext();
  }

  private scheduleNext(): void {
    if (!this.isRunning) return;

    const now = this.clock();
    const next = getNextMinuteBoundary(this.intervalMinutes, now);
    const delayMs = next.toDate().getTime() - now.getTime();

    console.log(
      `[SyncService] Next run at ${formatTimeUTC(next.toDate().getTime())}`,
    );
    this.timeoutId = setTimeout(() => {
      this.tick().catch((error: unknown) => {
        console.error("[SyncService] Tick failed:", error);
      });
    }, delayMs);
  }
}
