import { invalidOption } from "./errors/catalog.js";

/**
 * Parse an optional integer flag that must be >= 0.
 * Returns undefined when the flag was not given.
 */
export function parseNonNegativeInteger(
  flag: string,
  value: string | undefined
): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw invalidOption(flag, `expected a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}
