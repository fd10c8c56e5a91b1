/**
 * Runtime Type Guards
 *
 * Narrowing functions for the shared domain types. Used at the system
 * boundary (workflow-engine payloads, HTTP bodies, snapshot files).
 */

import type { Pov } from "./pov.js";
import type { Severity, ValidationResult, GateCheckResult } from "./results.js";
import type { NotificationKind, TransitionKind, WorkflowAction } from "./workflow.js";

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// POV
// =============================================================================

export function isPov(value: unknown): value is Pov {
  if (!isRecord(value)) return false;
  if (
    !isNonEmptyString(value.scenario) ||
    !isNonEmptyString(value.period) ||
    !isNonEmptyString(value.entity)
  ) {
    return false;
  }
  if (value.account !== undefined && !isNonEmptyString(value.account)) {
    return false;
  }
  if (value.extraDimensions !== undefined) {
    const extra = value.extraDimensions;
    if (!isRecord(extra)) return false;
    return Object.values(extra).every((v) => typeof v === "string");
  }
  return true;
}

// =============================================================================
// Results
// =============================================================================

const SEVERITIES = new Set<string>(["pass", "warning", "critical"]);

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITIES.has(value);
}

export function isValidationResult(value: unknown): value is ValidationResult {
  if (!isRecord(value)) return false;
  return (
    isNonEmptyString(value.ruleName) &&
    isSeverity(value.severity) &&
    typeof value.message === "string"
  );
}

export function isGateCheckResult(value: unknown): value is GateCheckResult {
  if (!isRecord(value)) return false;
  return (
    isNonEmptyString(value.gateName) &&
    typeof value.passed === "boolean" &&
    typeof value.reason === "string"
  );
}

// =============================================================================
// Workflow
// =============================================================================

const TRANSITION_KINDS = new Set<string>([
  "submit", "ic-reconciliation", "review", "certify",
]);

const WORKFLOW_ACTIONS = new Set<string>([
  "submit", "approve", "reject", "lock", "unlock",
]);

const NOTIFICATION_KINDS = new Set<string>([
  "submission", "approval", "rejection", "data-quality", "ic-mismatch",
]);

export function isTransitionKind(value: unknown): value is TransitionKind {
  return typeof value === "string" && TRANSITION_KINDS.has(value);
}

export function isWorkflowAction(value: unknown): value is WorkflowAction {
  return typeof value === "string" && WORKFLOW_ACTIONS.has(value);
}

export function isNotificationKind(value: unknown): value is NotificationKind {
  return typeof value === "string" && NOTIFICATION_KINDS.has(value);
}
