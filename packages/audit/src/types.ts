/**
 * @closegate/audit domain types.
 */

// =============================================================================
// Categories
// =============================================================================

export type AuditCategory =
  | "DATA_CHANGE"
  | "WORKFLOW_ACTION"
  | "SYSTEM_EVENT"
  | "GENERIC_EVENT"
  | "GATE_DECISION"
  | "VALIDATION_RESULT"
  | "GATE_RESULT"
  | "IC_MISMATCH"
  | "BUDGET_ALERT"
  | "NOTIFICATION";

export const AUDIT_CATEGORIES: readonly AuditCategory[] = [
  "DATA_CHANGE",
  "WORKFLOW_ACTION",
  "SYSTEM_EVENT",
  "GENERIC_EVENT",
  "GATE_DECISION",
  "VALIDATION_RESULT",
  "GATE_RESULT",
  "IC_MISMATCH",
  "BUDGET_ALERT",
  "NOTIFICATION",
];

export function isAuditCategory(value: string): value is AuditCategory {
  return AUDIT_CATEGORIES.some((c) => c === value);
}

// =============================================================================
// Context
// =============================================================================

/** Captured once per execution and stamped on every entry it writes. */
export interface AuditContext {
  readonly user: string;
  readonly timestampUtc: Date;
  readonly sessionId: string;
  readonly machine: string;
  readonly scenario: string;
  readonly period: string;
  readonly entity: string;
}

/** Event-specific `key=value` pairs, in output order. */
export type AuditFields = readonly (readonly [key: string, value: string])[];

// =============================================================================
// Entries
// =============================================================================

export interface ParsedLogEntry {
  readonly category: AuditCategory;
  /** `yyyy-MM-dd HH:mm:ss.fff`, UTC. */
  readonly timestamp: string;
  readonly user: string;
  readonly sessionId: string;
  readonly machine: string;
  readonly scenario: string;
  readonly period: string;
  readonly entity: string;
  /** Event-specific fields. */
  readonly fields: Readonly<Record<string, string>>;
  readonly raw: string;
}

// =============================================================================
// Sink
// =============================================================================

/** Append-only destination for formatted entries. */
export interface LogSink {
  append(entry: string): void;
}
