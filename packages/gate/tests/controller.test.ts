import { describe, it, expect } from "vitest";
import { createPov, withAccount, withScenario } from "@closegate/types";
import type { Pov } from "@closegate/types";
import type { CellValue, DataCellRepository } from "@closegate/cube";
import { SubmissionError } from "../src/errors.js";
import { ACTUAL, HEALTHY, ON_BUDGET, readyWorld, seed } from "./fixtures.js";

/** Delegates to `inner` but never answers for one account. */
function hangingOn(account: string, inner: DataCellRepository): DataCellRepository {
  return {
    get: (pov: Pov): Promise<CellValue> =>
      pov.account === account ? new Promise<CellValue>(() => undefined) : inner.get(pov),
  };
}

describe("SubmissionGateController", () => {
  it("allows a ready period and records every result", async () => {
    const { controller } = readyWorld();
    const evaluation = await controller.evaluate({ user: "jdoe", pov: ACTUAL, transitionKind: "submit" });

    expect(evaluation.outcome).toEqual({ kind: "allow" });
    expect(evaluation.validationResults).toHaveLength(6);
    expect(evaluation.gateResults.map((g) => g.gateName)).toEqual([
      "ICMatching",
      "DataQualityValidation",
      "RequiredAccounts",
      "ICReconciliation",
      "ManagerApproval",
      "VarianceCommentary",
    ]);
    expect(evaluation.flagsReadAt).toBe("2024-02-05T09:30:00.000Z");
    expect(evaluation.durationMs).toBe(0);
  });

  it("rejects with exactly the two failing gates", async () => {
    const { cube, config, controller } = readyWorld();
    const budget = withScenario(ACTUAL, "Budget");
    seed(cube, budget, HEALTHY);
    await config.set("dataQualityStatus_Plant01_2024M1", "failed");

    const evaluation = await controller.evaluate({ user: "jdoe", pov: budget, transitionKind: "submit" });

    expect(evaluation.outcome).toEqual({
      kind: "reject",
      reasons: [
        "DataQualityValidation: Data quality validation has not been completed or has critical failures. " +
          "Please run data quality checks before submitting.",
        "ManagerApproval: Manager approval has not been obtained for this Budget submission. " +
          "Please obtain manager sign-off before submitting.",
      ],
    });
    expect(evaluation.gateResults.filter((g) => g.passed)).toHaveLength(4);
  });

  it("allows with warnings when the cube cannot be read", async () => {
    const { cube, controller } = readyWorld();
    cube.failOn(withAccount(ACTUAL, "OperatingExpenses"), new Error("cube offline"));

    const evaluation = await controller.evaluate({ user: "jdoe", pov: ACTUAL, transitionKind: "submit" });

    expect(evaluation.outcome).toEqual({ kind: "allow" });
    expect(evaluation.gateResults.find((g) => g.gateName === "RequiredAccounts")).toEqual({
      gateName: "RequiredAccounts",
      passed: true,
      reason: "Unable to verify required accounts (allowed with warning): cube offline",
    });
    expect(evaluation.gateResults.find((g) => g.gateName === "VarianceCommentary")).toEqual({
      gateName: "VarianceCommentary",
      passed: true,
      reason: "Unable to verify variance commentary (allowed with warning): cube offline",
    });
    expect(evaluation.validationResults.some((r) => r.severity === "critical")).toBe(false);
  });

  it("lists critical rules before IC matching and gates", async () => {
    const { cube, config, controller } = readyWorld();
    cube.set(withAccount(ACTUAL, "TotalDebits"), 500_010);
    await config.set("icPartners_Plant01", "Plant02");
    cube.set(createPov({ ...ACTUAL, account: "ICReceivables", extraDimensions: { ic: "Plant02" } }), 1000);

    const evaluation = await controller.evaluate({ user: "jdoe", pov: ACTUAL, transitionKind: "review" });

    expect(evaluation.outcome.kind).toBe("reject");
    if (evaluation.outcome.kind === "reject") {
      expect(evaluation.outcome.reasons).toHaveLength(2);
      expect(evaluation.outcome.reasons[0]).toBe(
        "TrialBalance: Trial balance out of balance by 10.00. Debits=500,010.00, Credits=500,000.00",
      );
      expect(evaluation.outcome.reasons[1]!.startsWith("ICMatching: IC matching validation failed.")).toBe(true);
    }
  });

  it("emits events in a fixed order around the results", async () => {
    const { controller } = readyWorld();
    const evaluation = await controller.evaluate({ user: "jdoe", pov: ACTUAL, transitionKind: "submit" });
    const types = evaluation.events.map((e) => e.type);

    expect(types[0]).toBe("evaluation-started");
    expect(types[1]).toBe("flags-read");
    expect(types.filter((t) => t === "validation-result")).toHaveLength(6);
    expect(types.filter((t) => t === "gate-result")).toHaveLength(6);
    expect(types[types.length - 1]).toBe("evaluation-decided");
  });

  it("emits the IC checks it skipped before the gate results", async () => {
    const { cube, config, controller } = readyWorld();
    await config.set("icPartners_Plant01", "Plant02");
    cube.failOn(
      createPov({ ...ACTUAL, entity: "Plant02", account: "ICPayables", extraDimensions: { ic: "Plant01" } }),
      new Error("cube offline"),
    );

    const evaluation = await controller.evaluate({ user: "jdoe", pov: ACTUAL, transitionKind: "submit" });
    const skipped = evaluation.events.filter((e) => e.type === "ic-pair-unreadable");

    expect(evaluation.outcome).toEqual({ kind: "allow" });
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toMatchObject({ partnerEntity: "Plant02", pairType: "AR/AP" });
    const types = evaluation.events.map((e) => e.type);
    expect(types.indexOf("ic-pair-unreadable")).toBeLessThan(types.indexOf("gate-result"));
  });

  it("produces the same digest for the same inputs and results", async () => {
    const context = { user: "jdoe", pov: ACTUAL, transitionKind: "submit" as const };
    const first = await readyWorld().controller.evaluate(context);
    const second = await readyWorld().controller.evaluate(context);

    expect(first.digest).toMatch(/^[0-9a-f]{64}$/);
    expect(second.digest).toBe(first.digest);

    const other = await readyWorld().controller.evaluate({ ...context, user: "asmith" });
    expect(other.digest).not.toBe(first.digest);
  });

  describe("cancellation", () => {
    it("times out and keeps the results that had settled", async () => {
      const seeded = readyWorld();
      const { controller } = readyWorld(hangingOn("STAT_FTE", seeded.cube));

      const evaluation = await controller.evaluate(
        { user: "jdoe", pov: ACTUAL, transitionKind: "submit" },
        { timeoutMs: 20 },
      );

      expect(evaluation.outcome).toEqual({ kind: "aborted", reason: "Evaluation timed out after 20 ms" });
      expect(evaluation.validationResults.map((r) => r.ruleName)).not.toContain("StatisticalData");
      expect(evaluation.validationResults).toHaveLength(5);
      expect(evaluation.gateResults).toHaveLength(6);
      expect(evaluation.events[evaluation.events.length - 1]!.type).toBe("evaluation-decided");
    });

    it("stops waiting when the caller aborts", async () => {
      const seeded = readyWorld();
      const { controller } = readyWorld(hangingOn("STAT_FTE", seeded.cube));
      const abort = new AbortController();
      setTimeout(() => abort.abort(new Error("workflow cancelled")), 10);

      const evaluation = await controller.evaluate(
        { user: "jdoe", pov: ACTUAL, transitionKind: "submit" },
        { signal: abort.signal },
      );

      expect(evaluation.outcome).toEqual({ kind: "aborted", reason: "workflow cancelled" });
      expect(evaluation.validationResults).toHaveLength(5);
    });

    it("aborts at once for an already-aborted signal", async () => {
      const { controller } = readyWorld();
      const abort = new AbortController();
      abort.abort("shutting down");

      const evaluation = await controller.evaluate(
        { user: "jdoe", pov: ACTUAL, transitionKind: "submit" },
        { signal: abort.signal },
      );
      expect(evaluation.outcome).toEqual({ kind: "aborted", reason: "shutting down" });
    });

    it("finishes normally when the work beats the timeout", async () => {
      const { controller } = readyWorld();
      const evaluation = await controller.evaluate(
        { user: "jdoe", pov: ACTUAL, transitionKind: "submit" },
        { timeoutMs: 5_000 },
      );
      expect(evaluation.outcome).toEqual({ kind: "allow" });
    });
  });

  describe("input validation", () => {
    it("rejects a POV without an entity", async () => {
      const { controller } = readyWorld();
      const pov = createPov({ scenario: "Actual", period: "2024M1", entity: " " });

      await expect(controller.evaluate({ user: "jdoe", pov, transitionKind: "submit" })).rejects.toMatchObject({
        code: "INVALID_POV",
      });
    });

    it("rejects a context without a user", async () => {
      const { controller } = readyWorld();
      await expect(
        controller.evaluate({ user: "", pov: ACTUAL, transitionKind: "submit" }),
      ).rejects.toBeInstanceOf(SubmissionError);
    });
  });

  it("reads the budget reference for variance", async () => {
    const { cube, controller } = readyWorld();
    seed(cube, withScenario(ACTUAL, "Budget"), { ...ON_BUDGET, Revenue: 1_000_000 });

    const evaluation = await controller.evaluate({ user: "jdoe", pov: ACTUAL, transitionKind: "submit" });
    expect(evaluation.outcome).toEqual({
      kind: "reject",
      reasons: ["VarianceCommentary: Commentary required for material variances on: Revenue (Var: 25.0% / $250,000)"],
    });
  });
});
