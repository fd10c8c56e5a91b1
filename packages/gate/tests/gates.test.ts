import { describe, it, expect } from "vitest";
import { withAccount, withScenario } from "@closegate/types";
import type { Pov, TransitionKind } from "@closegate/types";
import { CellReader, InMemoryDataCellRepository } from "@closegate/cube";
import {
  dataQualityGate,
  requiredAccountsGate,
  icReconciliationGate,
  managerApprovalGate,
  varianceCommentaryGate,
} from "../src/gates.js";
import type { GateContext } from "../src/gates.js";
import type { WorkflowFlags } from "../src/flags.js";
import { ACTUAL, FORECAST, flagsOf, seed, set } from "./fixtures.js";

function contextFor(
  cube: InMemoryDataCellRepository,
  flags: WorkflowFlags = flagsOf(),
  pov: Pov = ACTUAL,
  transitionKind: TransitionKind = "submit",
): GateContext {
  return { pov, transitionKind, flags, reader: new CellReader(cube) };
}

describe("dataQualityGate", () => {
  it("passes when the flag reads passed in any case", async () => {
    const outcome = await dataQualityGate.evaluate(
      contextFor(new InMemoryDataCellRepository(), flagsOf({ dataQualityStatus: set("PASSED") })),
    );
    expect(outcome.ok && outcome.value.passed).toBe(true);
  });

  it("fails when the flag is absent or failed", async () => {
    for (const dataQualityStatus of [set("failed"), { state: "absent" as const }]) {
      const outcome = await dataQualityGate.evaluate(
        contextFor(new InMemoryDataCellRepository(), flagsOf({ dataQualityStatus })),
      );
      expect(outcome.ok && outcome.value).toEqual({
        gateName: "DataQualityValidation",
        passed: false,
        reason:
          "Data quality validation has not been completed or has critical failures. " +
          "Please run data quality checks before submitting.",
      });
    }
  });

  it("returns a fetch error when the flag cannot be read", async () => {
    const outcome = await dataQualityGate.evaluate(
      contextFor(
        new InMemoryDataCellRepository(),
        flagsOf({ dataQualityStatus: { state: "unreadable", reason: "store down" } }),
      ),
    );
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe("STORE_UNAVAILABLE");
      expect(outcome.error.message).toBe("store down");
    }
  });
});

describe("requiredAccountsGate", () => {
  it("names the zero-valued accounts by code", async () => {
    const cube = seed(new InMemoryDataCellRepository(), ACTUAL, { Revenue: 10, OperatingExpenses: 5 });
    const outcome = await requiredAccountsGate.evaluate(contextFor(cube));

    expect(outcome.ok && outcome.value).toEqual({
      gateName: "RequiredAccounts",
      passed: false,
      reason: "The following required accounts have zero values: COGS, GrossProfit",
    });
  });

  it("returns the fetch error when a cell cannot be read", async () => {
    const cube = new InMemoryDataCellRepository().failOn(withAccount(ACTUAL, "Revenue"), new Error("cube offline"));
    const outcome = await requiredAccountsGate.evaluate(contextFor(cube));
    expect(outcome.ok).toBe(false);
  });
});

describe("icReconciliationGate", () => {
  const withActivity = (): InMemoryDataCellRepository =>
    seed(new InMemoryDataCellRepository(), ACTUAL, { ICReceivables: 100 });

  it("does not apply to review or certify steps", async () => {
    for (const step of ["review", "certify"] as const) {
      const outcome = await icReconciliationGate.evaluate(
        contextFor(withActivity(), flagsOf(), ACTUAL, step),
      );
      expect(outcome.ok && outcome.value.reason).toBe("Not applicable at this step.");
    }
  });

  it("passes automatically without IC activity", async () => {
    const outcome = await icReconciliationGate.evaluate(
      contextFor(new InMemoryDataCellRepository(), flagsOf(), ACTUAL, "ic-reconciliation"),
    );
    expect(outcome.ok && outcome.value).toEqual({
      gateName: "ICReconciliation",
      passed: true,
      reason: "No IC activity for this entity.",
    });
  });

  it("requires the reconciled flag when there is activity", async () => {
    const blocked = await icReconciliationGate.evaluate(contextFor(withActivity()));
    expect(blocked.ok && blocked.value.passed).toBe(false);
    expect(blocked.ok && blocked.value.reason).toBe(
      "Intercompany reconciliation has not been completed. " +
        "Please reconcile IC balances with partner entities before submitting.",
    );

    const allowed = await icReconciliationGate.evaluate(
      contextFor(withActivity(), flagsOf({ icReconStatus: set("Reconciled") })),
    );
    expect(allowed.ok && allowed.value.passed).toBe(true);
  });

  it("treats payables alone as activity", async () => {
    const cube = seed(new InMemoryDataCellRepository(), ACTUAL, { ICPayables: -40 });
    const outcome = await icReconciliationGate.evaluate(contextFor(cube));
    expect(outcome.ok && outcome.value.passed).toBe(false);
  });
});

describe("managerApprovalGate", () => {
  it("fails a Budget submission without approval and names the scenario", async () => {
    const budget = withScenario(ACTUAL, "Budget");
    const outcome = await managerApprovalGate.evaluate(
      contextFor(new InMemoryDataCellRepository(), flagsOf(), budget),
    );
    expect(outcome.ok && outcome.value).toEqual({
      gateName: "ManagerApproval",
      passed: false,
      reason:
        "Manager approval has not been obtained for this Budget submission. " +
        "Please obtain manager sign-off before submitting.",
    });
  });

  it("passes Actuals regardless of the flag", async () => {
    const outcome = await managerApprovalGate.evaluate(
      contextFor(new InMemoryDataCellRepository(), flagsOf({ managerApproval: set("rejected") })),
    );
    expect(outcome.ok && outcome.value).toEqual({
      gateName: "ManagerApproval",
      passed: true,
      reason: "Not required for Actuals.",
    });
  });

  it("passes a Forecast submission once approved", async () => {
    const outcome = await managerApprovalGate.evaluate(
      contextFor(new InMemoryDataCellRepository(), flagsOf({ managerApproval: set("APPROVED") }), FORECAST),
    );
    expect(outcome.ok && outcome.value.passed).toBe(true);
  });
});

describe("varianceCommentaryGate", () => {
  function varianceCube(): InMemoryDataCellRepository {
    const cube = seed(new InMemoryDataCellRepository(), ACTUAL, { Revenue: 120_000, COGS: 95_000 });
    return seed(cube, withScenario(ACTUAL, "Budget"), { Revenue: 100_000, COGS: 100_000 });
  }

  it("names a material variance that lacks commentary", async () => {
    const outcome = await varianceCommentaryGate.evaluate(contextFor(varianceCube()));
    expect(outcome.ok && outcome.value).toEqual({
      gateName: "VarianceCommentary",
      passed: false,
      reason: "Commentary required for material variances on: Revenue (Var: 20.0% / $20,000)",
    });
  });

  it("passes once commentary exists", async () => {
    const flags = flagsOf({ commentary: new Map([["Revenue", set("Volume ahead of plan")]]) });
    const outcome = await varianceCommentaryGate.evaluate(contextFor(varianceCube(), flags));
    expect(outcome.ok && outcome.value.passed).toBe(true);
  });

  it("reports unfavorable variances by magnitude", async () => {
    const cube = seed(new InMemoryDataCellRepository(), ACTUAL, { OperatingExpenses: 0 });
    seed(cube, withScenario(ACTUAL, "Budget"), { OperatingExpenses: 250_000 });
    const outcome = await varianceCommentaryGate.evaluate(contextFor(cube));
    expect(outcome.ok && outcome.value.reason).toBe(
      "Commentary required for material variances on: OperatingExpenses (Var: 100.0% / $250,000)",
    );
  });

  it("returns a fetch error when commentary cannot be read", async () => {
    const flags = flagsOf({
      commentary: new Map([["Revenue", { state: "unreadable" as const, reason: "store down" }]]),
    });
    const outcome = await varianceCommentaryGate.evaluate(contextFor(varianceCube(), flags));
    expect(outcome.ok).toBe(false);
  });
});
