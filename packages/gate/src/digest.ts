/**
 * Evaluation digest.
 *
 *   digest = sha256(canonicalize({ context, validationResults, gateResults, outcome }))
 *
 * Timing fields are left out so the same inputs and results always give the
 * same digest.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  GateCheckResult,
  SubmissionContext,
  ValidationResult,
} from "@closegate/types";
import type { EvaluationOutcome } from "./evaluation.js";

export interface DigestInput {
  readonly context: SubmissionContext;
  readonly validationResults: readonly ValidationResult[];
  readonly gateResults: readonly GateCheckResult[];
  readonly outcome: EvaluationOutcome;
}

export function computeEvaluationDigest(input: DigestInput): string {
  const content = canonicalize({
    context: {
      user: input.context.user,
      pov: input.context.pov,
      transitionKind: input.context.transitionKind,
    },
    validationResults: input.validationResults,
    gateResults: input.gateResults,
    outcome: input.outcome,
  });
  return createHash("sha256").update(content).digest("hex");
}
