/**
 * @closegate/types: Shared domain types for the close-gate stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in consuming packages, not in the types
 */

// POV
export type { Pov } from "./pov.js";
export {
  IC_PARTNER_DIMENSION,
  createPov,
  withAccount,
  withScenario,
  withEntity,
  withPartner,
  povKey,
  describePov,
} from "./pov.js";

// Results
export type {
  Severity,
  ValidationResult,
  GateCheckResult,
  Result,
} from "./results.js";
export { ok, err } from "./results.js";

// Financial records
export type {
  AccountDefinition,
  IcPairType,
  ICMismatch,
  BudgetAlert,
} from "./financial.js";

// Workflow
export type {
  TransitionKind,
  WorkflowAction,
  NotificationKind,
  SubmissionContext,
  SubmissionDecision,
} from "./workflow.js";

// Errors
export { DataFetchError } from "./errors.js";
export type { DataFetchErrorCode } from "./errors.js";

// Runtime type guards
export {
  isPov,
  isSeverity,
  isValidationResult,
  isGateCheckResult,
  isTransitionKind,
  isWorkflowAction,
  isNotificationKind,
} from "./guards.js";
