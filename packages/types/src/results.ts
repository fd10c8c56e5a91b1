/**
 * Evaluation results.
 *
 * ValidationResult and GateCheckResult are produced once per rule / gate per
 * evaluation and never merged or overwritten.
 */

/** Only `critical` blocks a transition. */
export type Severity = "pass" | "warning" | "critical";

export interface ValidationResult {
  readonly ruleName: string;
  readonly severity: Severity;
  readonly message: string;
}

export interface GateCheckResult {
  readonly gateName: string;
  readonly passed: boolean;
  readonly reason: string;
}

// =============================================================================
// Result
// =============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
