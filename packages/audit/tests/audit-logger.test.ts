import { describe, it, expect } from "vitest";
import { AuditLogger } from "../src/audit-logger.js";
import { InMemoryLogSink } from "../src/sinks.js";
import type { LogSink } from "../src/types.js";
import { CONTEXT, header } from "./fixtures.js";

function recording(): { logger: AuditLogger; sink: InMemoryLogSink } {
  const sink = new InMemoryLogSink();
  return { logger: new AuditLogger({ sink }), sink };
}

function lastLine(sink: InMemoryLogSink): string | undefined {
  return sink.query({ limit: 1 })[0]?.raw;
}

const failing: LogSink = {
  append: () => {
    throw new Error("disk full");
  },
};

describe("AuditLogger event families", () => {
  it("logs a data change with the change amount", () => {
    const { logger, sink } = recording();
    logger.logDataChange(CONTEXT, { account: "Revenue", oldValue: 1000, newValue: 1250.5 });
    expect(lastLine(sink)).toBe(
      `${header("DATA_CHANGE")}|Account=Revenue|OldValue=1,000.00|NewValue=1,250.50|ChangeAmount=250.50`,
    );
  });

  it("logs a workflow action with sanitized comments", () => {
    const { logger, sink } = recording();
    logger.logWorkflowAction(CONTEXT, {
      action: "reject",
      fromStatus: "Submitted",
      toStatus: "Rejected",
      comments: "Fix IC|AP\nthen resubmit",
    });
    expect(lastLine(sink)).toBe(
      `${header("WORKFLOW_ACTION")}|Action=reject|FromStatus=Submitted|ToStatus=Rejected|Comments=Fix IC;AP then resubmit`,
    );
  });

  it("logs a system event with a default status", () => {
    const { logger, sink } = recording();
    logger.logSystemEvent(CONTEXT, { type: "consolidation" });
    expect(lastLine(sink)).toBe(`${header("SYSTEM_EVENT")}|EventSubType=consolidation|Status=Started|Details=`);
  });

  it("logs a generic event", () => {
    const { logger, sink } = recording();
    logger.logGenericEvent(CONTEXT, "CacheCleared", "All tiles");
    expect(lastLine(sink)).toBe(`${header("GENERIC_EVENT")}|EventType=CacheCleared|Details=All tiles`);
  });

  it("logs a gate decision with its digest", () => {
    const { logger, sink } = recording();
    logger.logGateDecision(CONTEXT, {
      transitionKind: "submit",
      outcome: "reject",
      reasons: ["ManagerApproval: missing", "RequiredAccounts: COGS"],
      digest: "abc123",
      durationMs: 42,
    });
    expect(sink.query()[0]?.fields).toEqual({
      TransitionKind: "submit",
      Outcome: "reject",
      ReasonCount: "2",
      Reasons: "ManagerApproval: missing; RequiredAccounts: COGS",
      Digest: "abc123",
      DurationMs: "42",
    });
  });

  it("logs validation and gate results", () => {
    const { logger, sink } = recording();
    logger.logValidationResult(CONTEXT, { ruleName: "TrialBalance", severity: "critical", message: "off" });
    logger.logGateResult(CONTEXT, { gateName: "ManagerApproval", passed: true, reason: "ok" });

    const [gate, rule] = sink.query();
    expect(rule?.fields).toEqual({ Rule: "TrialBalance", Severity: "CRITICAL", Message: "off" });
    expect(gate?.fields).toEqual({ Gate: "ManagerApproval", Passed: "true", Reason: "ok" });
  });

  it("logs IC mismatches and budget alerts with formatted amounts", () => {
    const { logger, sink } = recording();
    logger.logIcMismatch(CONTEXT, {
      partnerEntity: "Plant02",
      pairType: "AR/AP",
      entityAmount: 1000,
      partnerAmount: 300,
      difference: 700,
    });
    logger.logBudgetAlert(CONTEXT, {
      accountCode: "Revenue",
      accountName: "Revenue",
      currentValue: 120_000,
      budgetValue: 100_000,
      varianceAmount: 20_000,
      variancePercent: 0.2,
      isFavorable: true,
    });

    const [alert, mismatch] = sink.query();
    expect(mismatch?.fields).toEqual({
      Partner: "Plant02",
      PairType: "AR/AP",
      EntityAmount: "1,000.00",
      PartnerAmount: "300.00",
      Difference: "700.00",
    });
    expect(alert?.fields).toEqual({
      Account: "Revenue",
      Current: "120,000.00",
      Budget: "100,000.00",
      Variance: "20,000.00",
      VariancePct: "20.0%",
      Favorable: "true",
    });
  });

  it("logs notification outcomes", () => {
    const { logger, sink } = recording();
    logger.logNotification(CONTEXT, { kind: "ic-mismatch", recipients: 2, delivered: 1, failed: 1 });
    expect(sink.query()[0]?.fields).toEqual({ Kind: "ic-mismatch", Recipients: "2", Delivered: "1", Failed: "1" });
  });
});

describe("AuditLogger failure handling", () => {
  it("never throws when the sink fails and reports to the fallback", () => {
    const reported: string[] = [];
    const logger = new AuditLogger({ sink: failing, fallback: (message) => void reported.push(message) });

    expect(() => logger.logGenericEvent(CONTEXT, "Test", "x")).not.toThrow();
    expect(logger.dropped).toBe(1);
    expect(reported).toEqual(["Audit GENERIC_EVENT entry dropped: disk full"]);
  });

  it("survives a failing fallback", () => {
    const logger = new AuditLogger({
      sink: failing,
      fallback: () => {
        throw new Error("fallback down");
      },
    });

    logger.logGenericEvent(CONTEXT, "Test", "x");
    logger.logGenericEvent(CONTEXT, "Test", "y");

    expect(logger.dropped).toBe(2);
    expect(logger.fallbackFailures).toBe(2);
  });

  it("counts drops without a fallback", () => {
    const logger = new AuditLogger({ sink: failing });
    logger.logSystemEvent(CONTEXT, { type: "data-load", status: "Completed" });
    expect(logger.dropped).toBe(1);
    expect(logger.fallbackFailures).toBe(0);
  });
});
