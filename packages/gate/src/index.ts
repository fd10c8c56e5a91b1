/**
 * @closegate/gate: Submission gating.
 *
 * Decides whether a period may move to its next workflow state:
 * - WorkflowFlags: typed snapshot of the externally-set flags
 * - Five gates, each with its own fetch-failure policy
 * - GateAggregator: runs the gates, never short-circuits
 * - SubmissionGateController: rules + IC matching + gates, with cancellation
 */

// Controller
export { SubmissionGateController, icDiagnostics, validateContext } from "./controller.js";
export type { SubmissionGateControllerConfig, EvaluateOptions } from "./controller.js";

// Evaluation record
export type { SubmissionEvaluation, EvaluationOutcome } from "./evaluation.js";
export type { EvaluationEvent, EvaluationEventType, IcDiagnosticEvent } from "./events.js";
export { computeEvaluationDigest } from "./digest.js";
export type { DigestInput } from "./digest.js";

// Aggregation
export { GateAggregator, decide, formatRejection } from "./aggregator.js";
export type { GateResultListener } from "./aggregator.js";

// Gates
export {
  dataQualityGate,
  requiredAccountsGate,
  icReconciliationGate,
  managerApprovalGate,
  varianceCommentaryGate,
  DEFAULT_GATES,
} from "./gates.js";
export type { SubmissionGate, GateContext, GateOutcome, FetchErrorPolicy } from "./gates.js";

// Flags
export { WorkflowFlagsAdapter, flagEquals, flagPresent } from "./flags.js";
export type { FlagValue, WorkflowFlags } from "./flags.js";

// Errors
export { SubmissionError } from "./errors.js";
export type { SubmissionErrorCode } from "./errors.js";
