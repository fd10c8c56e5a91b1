/**
 * The record of one submission evaluation.
 */

import type {
  GateCheckResult,
  SubmissionContext,
  ValidationResult,
} from "@closegate/types";
import type { EvaluationEvent } from "./events.js";

export type EvaluationOutcome =
  | { readonly kind: "allow" }
  | { readonly kind: "reject"; readonly reasons: readonly string[] }
  | { readonly kind: "aborted"; readonly reason: string };

export interface SubmissionEvaluation {
  readonly context: SubmissionContext;
  readonly outcome: EvaluationOutcome;
  /** In rule order. Partial when the evaluation was aborted. */
  readonly validationResults: readonly ValidationResult[];
  /** `ICMatching` first, then the five gates in order. Partial when aborted. */
  readonly gateResults: readonly GateCheckResult[];
  readonly flagsReadAt?: string | undefined;
  readonly startedAt: string;
  readonly durationMs: number;
  /** sha256 over the canonical JSON of context, results and outcome. */
  readonly digest: string;
  readonly events: readonly EvaluationEvent[];
}
