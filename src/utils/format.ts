import { ResultsTableRow } from "../models/ResultsTable";

/** Placeholder shown for values that are undefined (e.g., break-even with no indirect yield). */
export const MISSING_VALUE = "n/a";

/**
 * Formats a number with grouping and a fixed number of decimals.
 *
 * @example
 * ```ts
 * formatNumber(70921.98581560283, 2) // "70,921.99"
 * formatNumber(null, 2) // "n/a"
 * ```
 */
export function formatNumber(value: number | null, fractionDigits: number): string {
  if (value === null) {
    return MISSING_VALUE;
  }
  return value.toLocaleString("en-US", {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}

/**
 * Formats a results table value: amounts to 2 decimals, rates to 4.
 */
export function formatTableValue(row: ResultsTableRow): string {
  return formatNumber(row.value, row.kind === "amount" ? 2 : 4);
}
