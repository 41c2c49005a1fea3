/**
 * Common types shared across the fetch coordinator and the statistics import
 */

// Branded type for millisecond timestamps
export type Milliseconds = number & { readonly __brand: "Milliseconds" };

export function asMilliseconds(value: number): Milliseconds {
  return value as Milliseconds;
}

/**
 * Fuel type as reported on a meter node
 */
export type FuelType = "Electric" | "Gas";

/**
 * Which way the energy flowed: consumption from the grid or return to it
 */
export type Direction = "consumption" | "return";
