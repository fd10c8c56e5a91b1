/**
 * Runtime type guard tests for @closegate/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed payloads arriving from the workflow engine.
 */
import { describe, it, expect } from "vitest";
import {
  isPov,
  isSeverity,
  isValidationResult,
  isGateCheckResult,
  isTransitionKind,
  isWorkflowAction,
  isNotificationKind,
} from "../src/guards.js";

// =============================================================================
// POV
// =============================================================================

describe("isPov", () => {
  it("accepts a minimal POV", () => {
    expect(isPov({ scenario: "Actual", period: "2024M1", entity: "Plant01" })).toBe(true);
  });

  it("accepts account and extra dimensions", () => {
    expect(
      isPov({
        scenario: "Budget",
        period: "2024M3",
        entity: "Plant01",
        account: "Revenue",
        extraDimensions: { ic: "Plant02" },
      }),
    ).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isPov(null)).toBe(false);
    expect(isPov("Actual/2024M1/Plant01")).toBe(false);
    expect(isPov([])).toBe(false);
  });

  it("rejects blank entity", () => {
    expect(isPov({ scenario: "Actual", period: "2024M1", entity: "  " })).toBe(false);
  });

  it("rejects missing period", () => {
    expect(isPov({ scenario: "Actual", entity: "Plant01" })).toBe(false);
  });

  it("rejects empty account", () => {
    expect(
      isPov({ scenario: "Actual", period: "2024M1", entity: "Plant01", account: "" }),
    ).toBe(false);
  });

  it("rejects non-string extra dimension values", () => {
    expect(
      isPov({
        scenario: "Actual",
        period: "2024M1",
        entity: "Plant01",
        extraDimensions: { ic: 7 },
      }),
    ).toBe(false);
  });
});

// =============================================================================
// Results
// =============================================================================

describe("isSeverity", () => {
  it("accepts the three severities", () => {
    expect(isSeverity("pass")).toBe(true);
    expect(isSeverity("warning")).toBe(true);
    expect(isSeverity("critical")).toBe(true);
  });

  it("rejects upper-case and unknown values", () => {
    expect(isSeverity("CRITICAL")).toBe(false);
    expect(isSeverity("error")).toBe(false);
    expect(isSeverity(undefined)).toBe(false);
  });
});

describe("isValidationResult", () => {
  it("accepts a valid result", () => {
    expect(
      isValidationResult({ ruleName: "TrialBalance", severity: "pass", message: "ok" }),
    ).toBe(true);
  });

  it("rejects an unknown severity", () => {
    expect(
      isValidationResult({ ruleName: "TrialBalance", severity: "fatal", message: "x" }),
    ).toBe(false);
  });
});

describe("isGateCheckResult", () => {
  it("accepts a failed gate with reason", () => {
    expect(
      isGateCheckResult({ gateName: "ManagerApproval", passed: false, reason: "missing" }),
    ).toBe(true);
  });

  it("rejects a string passed flag", () => {
    expect(
      isGateCheckResult({ gateName: "ManagerApproval", passed: "false", reason: "" }),
    ).toBe(false);
  });
});

// =============================================================================
// Workflow
// =============================================================================

describe("workflow guards", () => {
  it("recognizes transition kinds", () => {
    expect(isTransitionKind("submit")).toBe(true);
    expect(isTransitionKind("ic-reconciliation")).toBe(true);
    expect(isTransitionKind("Submit")).toBe(false);
  });

  it("recognizes workflow actions", () => {
    expect(isWorkflowAction("approve")).toBe(true);
    expect(isWorkflowAction("promote")).toBe(false);
  });

  it("recognizes notification kinds", () => {
    expect(isNotificationKind("ic-mismatch")).toBe(true);
    expect(isNotificationKind("IC_MISMATCH")).toBe(false);
  });
});
