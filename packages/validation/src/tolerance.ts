/**
 * Tolerance comparison and amount formatting.
 *
 * Cube values are IEEE doubles, so `100.01 - 100` is a hair above `0.01`.
 * Comparisons allow that representation error before declaring a breach.
 */

/** Slack absorbed by every tolerance and threshold comparison. */
export const EPSILON = 1e-9;

/** `difference > tolerance`, ignoring floating-point noise. */
export function exceedsTolerance(difference: number, tolerance: number): boolean {
  return difference - tolerance > EPSILON;
}

/** `value >= threshold`, ignoring floating-point noise. */
export function meetsThreshold(value: number, threshold: number): boolean {
  return value >= threshold - EPSILON;
}

const AMOUNT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const WHOLE = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

const PERCENT = new Intl.NumberFormat("en-US", {
  style: "percent",
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

/** `1234.5` → `"1,234.50"` */
export function formatAmount(value: number): string {
  return AMOUNT.format(value);
}

/** `20000.4` → `"20,000"` */
export function formatWholeAmount(value: number): string {
  return WHOLE.format(value);
}

/** Fraction to percent: `0.2` → `"20.0%"` */
export function formatPercent(fraction: number): string {
  return PERCENT.format(fraction);
}
