import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// Series metadata - one row per statistic series
export const statisticsMeta = sqliteTable("statistics_meta", {
  seriesId: text("series_id").primaryKey(), // e.g. "usage_ledger:123_electric_hourly_usage"
  name: text("name").notNull(),
  unit: text("unit").notNull(), // 'kWh', 'CCF', 'therm', 'USD'
  unitClass: text("unit_class").notNull(), // 'energy', 'volume', 'monetary'
  source: text("source").notNull(),
  hasSum: integer("has_sum", { mode: "boolean" }).notNull().default(true),
  hasMean: integer("has_mean", { mode: "boolean" }).notNull().default(false),
  updatedAtMs: integer("updated_at_ms")
    .notNull()
    .default(sql`(unixepoch() * 1000)`),
});

// Hourly (or monthly) points with running sums
export const statistics = sqliteTable(
  "statistics",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    seriesId: text("series_id").notNull(),
    startMs: integer("start_ms").notNull(), // top of hour / start of month, UTC
    state: real("state").notNull(), // value for the period
    sum: real("sum").notNull(), // running total including this period
    createdAtMs: integer("created_at_ms")
      .notNull()
      .default(sql`(unixepoch() * 1000)`),
  },
  (table) => ({
    // One point per series per period; appends upsert on this key
    seriesStartUnique: uniqueIndex("statistics_series_start_unique").on(
      table.seriesId,
      table.startMs,
    ),
    startIdx: index("statistics_start_idx").on(table.startMs),
  }),
);

export type StatisticsMetaRow = typeof statisticsMeta.$inferSelect;
export type StatisticsRow = typeof statistics.$inferSelect;
export type NewStatisticsRow = typeof statistics.$inferInsert;
