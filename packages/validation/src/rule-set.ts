/**
 * ValidationRuleSet
 *
 * Runs every rule concurrently against one POV and returns one result per
 * rule, in rule order. A rule whose reads fail is reported as a warning
 * naming what could not be validated; it never prevents the other rules from
 * reporting.
 */

import type { Pov, ValidationResult } from "@closegate/types";
import type { CellReader } from "@closegate/cube";
import { DEFAULT_RULES } from "./rules.js";
import type { RuleOutcome, ValidationRule } from "./rules.js";

/** Called as each rule settles, before the whole set completes. */
export type RuleResultListener = (index: number, result: ValidationResult) => void;

export interface ValidationSummary {
  readonly passed: number;
  readonly warnings: number;
  readonly critical: number;
}

export class ValidationRuleSet {
  constructor(
    private readonly reader: CellReader,
    readonly rules: readonly ValidationRule[] = DEFAULT_RULES,
  ) {}

  async evaluate(pov: Pov, onResult?: RuleResultListener): Promise<readonly ValidationResult[]> {
    return Promise.all(
      this.rules.map(async (rule, index) => {
        const result = ValidationRuleSet.settle(rule, await rule.check(this.reader, pov));
        onResult?.(index, result);
        return result;
      }),
    );
  }

  /** Apply the fetch-failure policy: an unreadable rule becomes a warning. */
  static settle(rule: ValidationRule, outcome: RuleOutcome): ValidationResult {
    if (outcome.ok) {
      return outcome.value;
    }
    return {
      ruleName: rule.name,
      severity: "warning",
      message: `Unable to validate ${rule.subject}: ${outcome.error.message}`,
    };
  }
}

export function hasCritical(results: readonly ValidationResult[]): boolean {
  return results.some((r) => r.severity === "critical");
}

export function summarize(results: readonly ValidationResult[]): ValidationSummary {
  let passed = 0;
  let warnings = 0;
  let critical = 0;
  for (const r of results) {
    if (r.severity === "pass") passed++;
    else if (r.severity === "warning") warnings++;
    else critical++;
  }
  return { passed, warnings, critical };
}

/** Block reasons in `{rule}: {message}` form, one per critical result. */
export function criticalReasons(results: readonly ValidationResult[]): readonly string[] {
  return results
    .filter((r) => r.severity === "critical")
    .map((r) => `${r.ruleName}: ${r.message}`);
}
