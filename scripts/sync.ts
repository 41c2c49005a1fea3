#!/usr/bin/env npx tsx

/**
 * Usage ledger sync CLI
 *
 * Usage:
 *   npm run sync -- once                     # One cycle, mode picked from the store
 *   npm run sync -- once --mode midnight     # Force a mode
 *   npm run sync -- watch                    # Hourly schedule until Ctrl-C
 *   npm run sync -- resync --account 1234    # Full historical re-import
 *   npm run sync -- status                   # Series in the store
 */

import "./load-env";
import { Command } from "commander";
import { API_CONFIG, DATABASE_CONFIG } from "@/config";
import { FetchCoordinator } from "@/lib/coordinator/coordinator";
import { isRefreshMode, RefreshMode } from "@/lib/coordinator/refresh-mode";
import { createDatabase, type DatabaseHandle } from "@/lib/db";
import { formatTimeUTC } from "@/lib/date-utils";
import { describeError } from "@/lib/errors";
import { formatJson } from "@/lib/json";
import { SqliteStatisticsStore } from "@/lib/statistics/sqlite-store";
import { SyncService, type SyncRunResult } from "@/lib/sync-service";
import { UtilityHttpClient } from "@/lib/utility/client";

interface GlobalOptions {
  database: string;
  json: boolean;
}

interface Runtime {
  handle: DatabaseHandle;
  store: SqliteStatisticsStore;
  coordinator: FetchCoordinator;
  service: SyncService;
}

async function createRuntime(databaseUrl: string): Promise<Runtime> {
  const handle = createDatabase(databaseUrl);
  const store = new SqliteStatisticsStore(handle.db);
  const hasHistory = (await store.listSeries()).length > 0;

  const coordinator = new FetchCoordinator({
    api: new UtilityHttpClient(),
    skipFirstRefresh: hasHistory,
  });
  const service = new SyncService({ coordinator, store });

  return { handle, store, coordinator, service };
}

function printRunSummary(result: SyncRunResult): void {
  const { cycle } = result;
  console.log("");
  console.log(`Mode:      ${result.mode}`);
  console.log(
    `Accounts:  ${cycle.accountsFetched.length} fetched, ${cycle.accountsFailed.length} failed`,
  );
  for (const failure of cycle.accountsFailed) {
    console.log(`  ✗ ${failure.accountId}: ${failure.error}`);
  }
  for (const feedError of cycle.feedErrors) {
    console.log(`  ⚠ ${feedError}`);
  }

  if (result.import) {
    console.log("Series:");
    for (const series of result.import.series) {
      const sum = series.finalSum === null ? "-" : series.finalSum.toFixed(3);
      const cleared = series.cleared ? " (replaced)" : "";
      console.log(
        `  ${series.seriesId}: ${series.numPoints} points, sum=${sum}${cleared}`,
      );
    }
  }
  console.log(`Result:    ${result.success ? "✅ success" : "❌ errors"}`);
  console.log(`Duration:  ${result.durationMs}ms`);
}

async function main() {
  const program = new Command();
  program
    .name("usage-ledger")
    .description("Sync utility meter usage into long-term statistics")
    .option(
      "--database <url>",
      "Database URL (default: DATABASE_URL or file:./usage-ledger.db)",
      DATABASE_CONFIG.url,
    )
    .option("--json", "Print results as JSON", false);

  const globals = () => program.opts<GlobalOptions>();

  program
    .command("once")
    .description("Run one fetch cycle and import statistics")
    .option(
      "--mode <mode>",
      `Refresh mode (${Object.values(RefreshMode).join(", ")})`,
    )
    .action(async (options: { mode?: string }) => {
      let mode: RefreshMode | undefined;
      if (options.mode !== undefined) {
        if (!isRefreshMode(options.mode)) {
          throw new Error(`Unknown mode: ${options.mode}`);
        }
        mode = options.mode;
      }

      const { handle, service } = await createRuntime(globals().database);
      try {
        const result = await service.runOnce("manual", mode);
        if (globals().json) {
          // Snapshots are large; print the counts only
          console.log(
            formatJson({
              ...result,
              cycle: { ...result.cycle, snapshot: undefined },
            }),
          );
        } else {
          printRunSummary(result);
        }
        process.exitCode = result.success ? 0 : 1;
      } finally {
        handle.close();
      }
    });

  program
    .command("watch")
    .description("Run on the hourly schedule until interrupted")
    .action(async () => {
      const { handle, service } = await createRuntime(globals().database);
      console.log(`📡 Syncing from ${API_CONFIG.baseUrl}`);

      const shutdown = () => {
        service.stop();
        handle.close();
        process.exit(0);
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      await service.start();
    });

  program
    .command("resync")
    .description("Reset to a first refresh and re-import full history")
    .option("--account <id...>", "Only these billing accounts")
    .action(async (options: { account?: string[] }) => {
      const { handle, service } = await createRuntime(globals().database);
      try {
        const result = await service.forceFullResync(options.account);
        printRunSummary(result);
        process.exitCode = result.success ? 0 : 1;
      } finally {
        handle.close();
      }
    });

  program
    .command("status")
    .description("List the series in the store")
    .action(async () => {
      const { handle, store } = await createRuntime(globals().database);
      try {
        const series = await store.listSeries();
        if (globals().json) {
          console.log(formatJson(series));
          return;
        }
        if (series.length === 0) {
          console.log("No statistics imported yet");
          return;
        }
        for (const entry of series) {
          const range =
            entry.firstMs !== null && entry.lastMs !== null
              ? `${formatTimeUTC(entry.firstMs)} → ${formatTimeUTC(entry.lastMs)}`
              : "empty";
          console.log(
            `${entry.seriesId} [${entry.unit}] ${entry.numPoints} points, ${range}, sum=${entry.lastSum?.toFixed(3) ?? "-"}`,
          );
        }
      } finally {
        handle.close();
      }
    });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  console.error(`❌ ${describeError(error)}`);
  process.exit(1);
});
