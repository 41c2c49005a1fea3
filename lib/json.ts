/**
 * JSON output for the CLI
 * - Fields ending in "Ms" holding epoch milliseconds become ISO8601 strings
 *   and lose the "Ms" suffix (`startMs` -> `start`); `durationMs` is left alone
 * - Maps become objects, Sets become arrays
 * - CalendarDate objects become YYYY-MM-DD strings
 */

import { CalendarDate } from "@internationalized/date";

// Fields that end in "Ms" but hold a duration, not an instant
const DURATION_FIELDS = new Set(["durationMs", "timeoutMs", "delayMs"]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Convert a value into something JSON.stringify prints readably
 */
export function transformForOutput(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  // Must check before generic objects
  if (value instanceof CalendarDate) {
    return value.toString();
  }

  if (value instanceof Map) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      result[String(key)] = transformForOutput(entry);
    }
    return result;
  }

  if (value instanceof Set) {
    return [...value].map(transformForOutput);
  }

  if (Array.isArray(value)) {
    return value.map(transformForOutput);
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (
        key.endsWith("Ms") &&
        key.length > 2 &&
        !DURATION_FIELDS.has(key) &&
        typeof entry === "number"
      ) {
        result[key.slice(0, -2)] = new Date(entry).toISOString();
      } else {
        result[key] = transformForOutput(entry);
      }
    }
    return result;
  }

  return value;
}

/**
 * Stringify with date formatting and two-space indentation
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(transformForOutput(value), null, 2);
}
