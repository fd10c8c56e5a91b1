/**
 * Variance of a current value against its reference (budget) value.
 */

import { meetsThreshold } from "./tolerance.js";

/** 10% of the reference value. */
export const VARIANCE_PCT_THRESHOLD = 0.1;

/** $100,000 absolute. */
export const VARIANCE_AMT_THRESHOLD = 100_000;

export interface Variance {
  readonly current: number;
  readonly reference: number;
  /** Signed: current minus reference. */
  readonly amount: number;
  /** Signed fraction of |reference|; 0 when the reference is 0. */
  readonly percent: number;
}

export function computeVariance(current: number, reference: number): Variance {
  const amount = current - reference;
  const percent = reference !== 0 ? amount / Math.abs(reference) : 0;
  return { current, reference, amount, percent };
}

/** Material when either the percentage or the absolute threshold is met. */
export function isMaterialVariance(variance: Variance): boolean {
  return (
    meetsThreshold(Math.abs(variance.percent), VARIANCE_PCT_THRESHOLD) ||
    meetsThreshold(Math.abs(variance.amount), VARIANCE_AMT_THRESHOLD)
  );
}
