#!/usr/bin/env npx tsx

/**
 * Initialize the statistics database
 * Run with: npx tsx scripts/init-db.ts [database-url]
 */

import "./load-env";
import { DATABASE_CONFIG } from "@/config";
import { createDatabase, toSqlitePath } from "@/lib/db";

const url = process.argv[2] || DATABASE_CONFIG.url;
console.log(`Initializing database at: ${toSqlitePath(url)}`);

const handle = createDatabase(url);

const tables = handle.sqlite
  .prepare(
    `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`,
  )
  .all();

console.log("✅ Tables:");
for (const table of tables) {
  if (typeof table === "object" && table !== null && "name" in table) {
    console.log(`  - ${String(table.name)}`);
  }
}

handle.close();
