import type { Config } from "drizzle-kit";
import { DATABASE_CONFIG } from "./config";

export default {
  schema: "./lib/db/schema.ts",
  out: "./drizzle",
  dialect: "sqlite",
  dbCredentials: {
    url: DATABASE_CONFIG.url.replace("file:", ""), // SQLite needs path without file: prefix
  },
  verbose: true,
  strict: true,
} satisfies Config;
