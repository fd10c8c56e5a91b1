/**
 * Submission gates.
 *
 * Each gate is an independent pass/fail check. A gate returns its
 * GateCheckResult, or the DataFetchError that kept it from deciding; the
 * aggregator turns that error into a result according to the gate's
 * `onFetchError` policy.
 */

import { DataFetchError, err, ok, withAccount, withScenario } from "@closegate/types";
import type { GateCheckResult, Pov, Result, TransitionKind } from "@closegate/types";
import type { CellReader } from "@closegate/cube";
import { FlagValues } from "@closegate/cube";
import {
  COMMENTARY_ACCOUNTS,
  REFERENCE_SCENARIO,
  REQUIRED_ACCOUNTS,
  computeVariance,
  formatPercent,
  formatWholeAmount,
  isMaterialVariance,
} from "@closegate/validation";
import { flagEquals, flagPresent } from "./flags.js";
import type { FlagValue, WorkflowFlags } from "./flags.js";

// =============================================================================
// Gate shape
// =============================================================================

export interface GateContext {
  readonly pov: Pov;
  readonly transitionKind: TransitionKind;
  readonly flags: WorkflowFlags;
  readonly reader: CellReader;
}

export type GateOutcome = Result<GateCheckResult, DataFetchError>;

/**
 * `pass-with-warning` lets the submission through when the gate cannot
 * read its inputs; `fail` blocks it. Every default gate passes with a
 * warning.
 */
export type FetchErrorPolicy = "pass-with-warning" | "fail";

export interface SubmissionGate {
  readonly name: string;
  /** Noun phrase used in fetch-failure reasons. */
  readonly subject: string;
  readonly onFetchError: FetchErrorPolicy;
  evaluate(context: GateContext): Promise<GateOutcome>;
}

function passed(gateName: string, reason: string): GateOutcome {
  return ok({ gateName, passed: true, reason });
}

function failed(gateName: string, reason: string): GateOutcome {
  return ok({ gateName, passed: false, reason });
}

function unreadable(flag: FlagValue): DataFetchError | undefined {
  return flag.state === "unreadable"
    ? new DataFetchError("STORE_UNAVAILABLE", flag.reason)
    : undefined;
}

// =============================================================================
// Gate 1: data quality
// =============================================================================

export const dataQualityGate: SubmissionGate = {
  name: "DataQualityValidation",
  subject: "data quality status",
  onFetchError: "pass-with-warning",
  async evaluate({ flags }) {
    const error = unreadable(flags.dataQualityStatus);
    if (error) return err(error);

    if (flagEquals(flags.dataQualityStatus, FlagValues.passed)) {
      return passed("DataQualityValidation", "Data quality checks passed.");
    }
    return failed(
      "DataQualityValidation",
      "Data quality validation has not been completed or has critical failures. " +
        "Please run data quality checks before submitting.",
    );
  },
};

// =============================================================================
// Gate 2: required accounts
// =============================================================================

export const requiredAccountsGate: SubmissionGate = {
  name: "RequiredAccounts",
  subject: "required accounts",
  onFetchError: "pass-with-warning",
  async evaluate({ pov, reader }) {
    const read = await reader.readAll(REQUIRED_ACCOUNTS.map((a) => withAccount(pov, a.code)));
    if (!read.ok) return read;

    const missing = REQUIRED_ACCOUNTS.filter((_, i) => read.value[i] === 0).map((a) => a.code);
    if (missing.length > 0) {
      return failed(
        "RequiredAccounts",
        `The following required accounts have zero values: ${missing.join(", ")}`,
      );
    }
    return passed("RequiredAccounts", "All required accounts populated.");
  },
};

// =============================================================================
// Gate 3: IC reconciliation
// =============================================================================

const IC_RECON_STEPS: ReadonlySet<TransitionKind> = new Set(["submit", "ic-reconciliation"]);

export const icReconciliationGate: SubmissionGate = {
  name: "ICReconciliation",
  subject: "IC reconciliation",
  onFetchError: "pass-with-warning",
  async evaluate({ pov, reader, flags, transitionKind }) {
    if (!IC_RECON_STEPS.has(transitionKind)) {
      return passed("ICReconciliation", "Not applicable at this step.");
    }

    const read = await reader.readAll([
      withAccount(pov, "ICReceivables"),
      withAccount(pov, "ICPayables"),
    ]);
    if (!read.ok) return read;

    const [receivables = 0, payables = 0] = read.value;
    if (receivables === 0 && payables === 0) {
      return passed("ICReconciliation", "No IC activity for this entity.");
    }

    const error = unreadable(flags.icReconStatus);
    if (error) return err(error);

    if (flagEquals(flags.icReconStatus, FlagValues.reconciled)) {
      return passed("ICReconciliation", "Intercompany reconciliation completed.");
    }
    return failed(
      "ICReconciliation",
      "Intercompany reconciliation has not been completed. " +
        "Please reconcile IC balances with partner entities before submitting.",
    );
  },
};

// =============================================================================
// Gate 4: manager approval
// =============================================================================

export const managerApprovalGate: SubmissionGate = {
  name: "ManagerApproval",
  subject: "manager approval",
  onFetchError: "pass-with-warning",
  async evaluate({ pov, flags }) {
    if (pov.scenario.toLowerCase() === "actual") {
      return passed("ManagerApproval", "Not required for Actuals.");
    }

    const error = unreadable(flags.managerApproval);
    if (error) return err(error);

    if (flagEquals(flags.managerApproval, FlagValues.approved)) {
      return passed("ManagerApproval", "Manager approval obtained.");
    }
    return failed(
      "ManagerApproval",
      `Manager approval has not been obtained for this ${pov.scenario} submission. ` +
        "Please obtain manager sign-off before submitting.",
    );
  },
};

// =============================================================================
// Gate 5: variance commentary
// =============================================================================

export const varianceCommentaryGate: SubmissionGate = {
  name: "VarianceCommentary",
  subject: "variance commentary",
  onFetchError: "pass-with-warning",
  async evaluate({ pov, reader, flags }) {
    const reference = withScenario(pov, REFERENCE_SCENARIO);
    const read = await reader.readAll(
      COMMENTARY_ACCOUNTS.flatMap((code) => [withAccount(pov, code), withAccount(reference, code)]),
    );
    if (!read.ok) return read;

    const missing: string[] = [];
    for (const [i, code] of COMMENTARY_ACCOUNTS.entries()) {
      const variance = computeVariance(read.value[2 * i] ?? 0, read.value[2 * i + 1] ?? 0);
      if (!isMaterialVariance(variance)) continue;

      const comment: FlagValue = flags.commentary.get(code) ?? { state: "absent" };
      const error = unreadable(comment);
      if (error) return err(error);

      if (!flagPresent(comment)) {
        missing.push(
          `${code} (Var: ${formatPercent(Math.abs(variance.percent))} / ` +
            `$${formatWholeAmount(Math.abs(variance.amount))})`,
        );
      }
    }

    if (missing.length > 0) {
      return failed(
        "VarianceCommentary",
        `Commentary required for material variances on: ${missing.join(", ")}`,
      );
    }
    return passed("VarianceCommentary", "No material variances lack commentary.");
  },
};

/** The five gates, in evaluation and reporting order. */
export const DEFAULT_GATES: readonly SubmissionGate[] = Object.freeze([
  dataQualityGate,
  requiredAccountsGate,
  icReconciliationGate,
  managerApprovalGate,
  varianceCommentaryGate,
]);
