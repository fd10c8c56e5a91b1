/**
 * Workflow vocabulary shared by the gate, audit and notification layers.
 */

import type { Pov } from "./pov.js";

/** The state transition being attempted. */
export type TransitionKind =
  | "submit"
  | "ic-reconciliation"
  | "review"
  | "certify";

/** Actions the workflow engine reports after a transition. */
export type WorkflowAction =
  | "submit"
  | "approve"
  | "reject"
  | "lock"
  | "unlock";

export type NotificationKind =
  | "submission"
  | "approval"
  | "rejection"
  | "data-quality"
  | "ic-mismatch";

/** Context handed over by the workflow engine at a transition attempt. */
export interface SubmissionContext {
  readonly user: string;
  readonly pov: Pov;
  readonly transitionKind: TransitionKind;
  /** Workflow session, when the engine supplies one. */
  readonly sessionId?: string | undefined;
}

/** Outcome returned to the workflow engine. */
export type SubmissionDecision =
  | { readonly kind: "allow" }
  | { readonly kind: "reject"; readonly reasons: readonly string[] };
