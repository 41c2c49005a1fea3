/**
 * SQLite-backed statistics store
 */

import { and, asc, desc, eq, inArray, lt, sql } from "drizzle-orm";
import { DATABASE_CONFIG } from "@/config";
import {
  statistics,
  statisticsMeta,
  type LedgerDatabase,
  type StatisticsMetaRow,
  type StatisticsRow,
} from "@/lib/db";
import { asMilliseconds, type Milliseconds } from "@/lib/types/common";
import type {
  StatisticMetadata,
  StatisticPoint,
  StatisticsStore,
} from "./types";

function toPoint(
  row: Pick<StatisticsRow, "startMs" | "state" | "sum">,
): StatisticPoint {
  return {
    startMs: asMilliseconds(row.startMs),
    state: row.state,
    sum: row.sum,
  };
}

type LedgerTransaction = Parameters<
  Parameters<LedgerDatabase["transaction"]>[0]
>[0];

export interface SeriesSummary {
  seriesId: string;
  name: string;
  unit: string;
  numPoints: number;
  firstMs: Milliseconds | null;
  lastMs: Milliseconds | null;
  lastSum: number | null;
}

export class SqliteStatisticsStore implements StatisticsStore {
  constructor(
    private readonly db: LedgerDatabase,
    private readonly batchSize: number = DATABASE_CONFIG.performance.batchSize,
  ) {}

  async getLastStatistic(seriesId: string): Promise<StatisticPoint | null> {
    const row = this.db
      .select({
        startMs: statistics.startMs,
        state: statistics.state,
        sum: statistics.sum,
      })
      .from(statistics)
      .where(eq(statistics.seriesId, seriesId))
      .orderBy(desc(statistics.startMs))
      .limit(1)
      .get();

    return row ? toPoint(row) : null;
  }

  async queryStatisticsBefore(
    seriesId: string,
    beforeMs: Milliseconds,
  ): Promise<StatisticPoint | null> {
    const row = this.db
      .select({
        startMs: statistics.startMs,
        state: statistics.state,
        sum: statistics.sum,
      })
      .from(statistics)
      .where(
        and(eq(statistics.seriesId, seriesId), lt(statistics.startMs, beforeMs)),
      )
      .orderBy(desc(statistics.startMs))
      .limit(1)
      .get();

    return row ? toPoint(row) : null;
  }

  async appendStatistics(
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): Promise<void> {
    // All or nothing per series
    this.db.transaction((tx) => {
      this.writeSeries(tx, metadata, points);
    });
  }

  async clearStatistics(seriesIds: readonly string[]): Promise<void> {
    if (seriesIds.length === 0) return;

    this.db.transaction((tx) => {
      this.deleteSeries(tx, [...seriesIds]);
    });
  }

  /**
   * Clear a series and write its new points in one transaction. With no
   * points the series is only cleared.
   */
  async replaceStatistics(
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): Promise<void> {
    this.db.transaction((tx) => {
      this.deleteSeries(tx, [metadata.seriesId]);
      if (points.length > 0) {
        this.writeSeries(tx, metadata, points);
      }
    });
  }

  private deleteSeries(tx: LedgerTransaction, ids: string[]): void {
    tx.delete(statistics).where(inArray(statistics.seriesId, ids)).run();
    tx.delete(statisticsMeta).where(inArray(statisticsMeta.seriesId, ids)).run();
  }

  private writeSeries(
    tx: LedgerTransaction,
    metadata: StatisticMetadata,
    points: readonly StatisticPoint[],
  ): void {
    const now = Date.now();

    tx.insert(statisticsMeta)
      .values({
        seriesId: metadata.seriesId,
        name: metadata.name,
        unit: metadata.unit,
        unitClass: metadata.unitClass,
        source: metadata.source,
        hasSum: metadata.hasSum,
        hasMean: metadata.hasMean,
        updatedAtMs: now,
      })
      .onConflictDoUpdate({
        target: statisticsMeta.seriesId,
        set: {
          name: metadata.name,
          unit: metadata.unit,
          unitClass: metadata.unitClass,
          source: metadata.source,
          updatedAtMs: now,
        },
      })
      .run();

    for (let i = 0; i < points.length; i += this.batchSize) {
      const batch = points.slice(i, i + this.batchSize);
      tx.insert(statistics)
        .values(
          batch.map((point) => ({
            seriesId: metadata.seriesId,
            startMs: point.startMs,
            state: point.state,
            sum: point.sum,
            createdAtMs: now,
          })),
        )
        .onConflictDoUpdate({
          target: [statistics.seriesId, statistics.startMs],
          set: {
            state: sql`excluded.state`,
            sum: sql`excluded.sum`,
          },
        })
        .run();
    }
  }

  async getPoints(seriesId: string): Promise<StatisticPoint[]> {
    const rows = this.db
      .select({
        startMs: statistics.startMs,
        state: statistics.state,
        sum: statistics.sum,
      })
      .from(statistics)
      .where(eq(statistics.seriesId, seriesId))
      .orderBy(asc(statistics.startMs))
      .all();

    return rows.map(toPoint);
  }

  async getMetadata(seriesId: string): Promise<StatisticsMetaRow | null> {
    const row = this.db
      .select()
      .from(statisticsMeta)
      .where(eq(statisticsMeta.seriesId, seriesId))
      .get();
    return row ?? null;
  }

  /**
   * One row per series with point counts and the latest running sum
   */
  async listSeries(): Promise<SeriesSummary[]> {
    const metas = this.db
      .select()
      .from(statisticsMeta)
      .orderBy(asc(statisticsMeta.seriesId))
      .all();

    const summaries: SeriesSummary[] = [];
    for (const meta of metas) {
      const counts = this.db
        .select({
          numPoints: sql<number>`count(*)`,
          firstMs: sql<number | null>`min(${statistics.startMs})`,
          lastMs: sql<number | null>`max(${statistics.startMs})`,
        })
        .from(statistics)
        .where(eq(statistics.seriesId, meta.seriesId))
        .get();
      const last = await this.getLastStatistic(meta.seriesId);

      summaries.push({
        seriesId: meta.seriesId,
        name: meta.name,
        unit: meta.unit,
        numPoints: counts?.numPoints ?? 0,
        firstMs:
          counts?.firstMs != null ? asMilliseconds(counts.firstMs) : null,
        lastMs: counts?.lastMs != null ? asMilliseconds(counts.lastMs) : null,
        lastSum: last?.sum ?? null,
      });
    }
    return summaries;
  }
}
