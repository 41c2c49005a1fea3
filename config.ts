// Configuration for the usage ledger

// Utility API Configuration
export const API_CONFIG = {
  baseUrl: process.env.UTILITY_API_URL || "http://localhost:8080/api",
  token: process.env.UTILITY_API_TOKEN || "",
  timeout: 30000, // 30 seconds timeout
} as const;

// Account selection (comma separated billing account ids)
export const ACCOUNT_IDS: readonly string[] = (
  process.env.UTILITY_ACCOUNT_IDS || ""
)
  .split(",")
  .map((id) => id.trim())
  .filter((id) => id.length > 0);

// Fetch windows and scheduling
export const SYNC_CONFIG = {
  firstRefreshUsageDays: 465, // ~15 months of monthly usage on first refresh
  firstRefreshAmiDays: 1825, // ~5 years of AMI readings on first refresh
  amiTrailingDays: 5, // AMI window for incremental and midnight refreshes
  intervalLookbackHours: 42, // upstream keeps ~43 hours of interval reads
  midnightHourUtc: 0, // scheduled tick that runs the midnight refresh
  scheduleIntervalMinutes: 60,
} as const;

export type GasAmiConversion = "none" | "therms_to_ccf";

function readGasAmiConversion(): GasAmiConversion {
  return process.env.GAS_AMI_CONVERSION === "therms_to_ccf"
    ? "therms_to_ccf"
    : "none";
}

// Statistics output
export const STATISTICS_CONFIG = {
  namespace: "usage_ledger",
  source: "usage_ledger",
  electricUnit: "kWh",
  gasUnit: "CCF",
  currency: "USD",
  minYear: 1990,
  maxYear: 2100,
  gasAmiConversion: readGasAmiConversion(),
} as const;

// Error Messages
export const ERROR_MESSAGES = {
  AUTH_FAILED: "Authentication failed. Please check credentials.",
  API_UNAVAILABLE: "Utility API is currently unavailable.",
  NETWORK_ERROR: "Network error. Please check your connection.",
  INVALID_RESPONSE: "Invalid response from API.",
  RATE_LIMITED: "Rate limited. Please try again later.",
  NO_ACCOUNTS: "No billing accounts configured (set UTILITY_ACCOUNT_IDS).",
} as const;

// Database Configuration
export const DATABASE_CONFIG = {
  // Local SQLite file holding the long-term statistics
  url: process.env.DATABASE_URL || "file:./usage-ledger.db",

  // Performance settings
  performance: {
    batchSize: 500, // Rows per insert statement
  },
} as const;
