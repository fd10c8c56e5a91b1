/**
 * GateAggregator
 *
 * Runs every gate concurrently and applies each gate's fetch-failure policy.
 * Results come back in gate order whatever order the gates finish in. The
 * decision over a complete result set lives here too.
 */

import type {
  GateCheckResult,
  SubmissionDecision,
  ValidationResult,
} from "@closegate/types";
import { DEFAULT_GATES } from "./gates.js";
import type { GateContext, GateOutcome, SubmissionGate } from "./gates.js";

export type GateResultListener = (index: number, result: GateCheckResult) => void;

export class GateAggregator {
  constructor(readonly gates: readonly SubmissionGate[] = DEFAULT_GATES) {}

  async evaluate(context: GateContext, onResult?: GateResultListener): Promise<readonly GateCheckResult[]> {
    return Promise.all(
      this.gates.map(async (gate, index) => {
        const result = GateAggregator.settle(gate, await gate.evaluate(context));
        onResult?.(index, result);
        return result;
      }),
    );
  }

  /** Apply the gate's fetch-failure policy to its outcome. */
  static settle(gate: SubmissionGate, outcome: GateOutcome): GateCheckResult {
    if (outcome.ok) {
      return outcome.value;
    }
    const message = outcome.error.message;
    if (gate.onFetchError === "pass-with-warning") {
      return {
        gateName: gate.name,
        passed: true,
        reason: `Unable to verify ${gate.subject} (allowed with warning): ${message}`,
      };
    }
    return {
      gateName: gate.name,
      passed: false,
      reason: `Error checking ${gate.subject}: ${message}`,
    };
  }
}

/**
 * Reject iff any validation result is critical or any gate failed.
 *
 * Reasons keep the order they are given in: critical rules first as
 * `{rule}: {message}`, then failed gates as `{gate}: {reason}`.
 */
export function decide(
  validationResults: readonly ValidationResult[],
  gateResults: readonly GateCheckResult[],
): SubmissionDecision {
  const reasons = [
    ...validationResults
      .filter((r) => r.severity === "critical")
      .map((r) => `${r.ruleName}: ${r.message}`),
    ...gateResults.filter((g) => !g.passed).map((g) => `${g.gateName}: ${g.reason}`),
  ];
  return reasons.length > 0 ? { kind: "reject", reasons } : { kind: "allow" };
}

/** The message shown to the user for a rejection. */
export function formatRejection(reasons: readonly string[]): string {
  return ["Submission rejected. The following checks failed:", ...reasons].join("\n");
}
