/**
 * IcReconciler: Top-level coordinator
 *
 * Resolves the entity's IC partners, runs the matcher over every pair and
 * folds the outcome into a report carrying the `ICMatching` gate result.
 *
 * Usage:
 *   const reconciler = new IcReconciler({ reader, config, entities });
 *   const report = await reconciler.reconcile(pov);
 *   if (!report.gateResult.passed) { ... }
 */

import type { GateCheckResult, ICMismatch, Pov } from "@closegate/types";
import type { CellReader, ConfigStore, EntityDirectory } from "@closegate/cube";
import { formatAmount, formatWholeAmount } from "@closegate/validation";
import { ICMatcher, IC_TOLERANCE, toMismatches } from "./ic-matcher.js";
import { PartnerResolver } from "./partners.js";
import type { IcMatchReport, IcMatchSummary, IcPairCheck } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface IcReconcilerConfig {
  readonly reader: CellReader;
  readonly config: ConfigStore;
  readonly entities: EntityDirectory;
  /** Override the $500 tolerance. */
  readonly tolerance?: number | undefined;
}

export const IC_GATE_NAME = "ICMatching";

// =============================================================================
// Reconciler
// =============================================================================

let reportCounter = 0;

export class IcReconciler {
  private readonly matcher: ICMatcher;
  private readonly partners: PartnerResolver;
  private readonly tolerance: number;

  constructor(config: IcReconcilerConfig) {
    this.tolerance = config.tolerance ?? IC_TOLERANCE;
    this.matcher = new ICMatcher(config.reader, undefined, this.tolerance);
    this.partners = new PartnerResolver(config.config, config.entities);
  }

  /**
   * Reconcile one entity against all of its partners.
   * Never rejects on data problems; they are reported inside the result.
   */
  async reconcile(pov: Pov): Promise<IcMatchReport> {
    reportCounter += 1;
    const id = `ic:${Date.now()}:${reportCounter}`;
    const timestamp = new Date().toISOString();

    const resolved = await this.partners.resolve(pov.entity);
    if (!resolved.ok) {
      return {
        id,
        entity: pov.entity,
        timestamp,
        checks: [],
        mismatches: [],
        summary: computeSummary(0, []),
        partnerLookupError: resolved.error,
        gateResult: {
          gateName: IC_GATE_NAME,
          passed: true,
          reason: `Unable to resolve IC partners (allowed with warning): ${resolved.error.message}`,
        },
      };
    }

    const { partners, source, configError } = resolved.value;
    const checks = await this.matcher.match(pov, partners);
    const mismatches = toMismatches(checks);
    const summary = computeSummary(partners.length, checks);

    return {
      id,
      entity: pov.entity,
      timestamp,
      partnerSource: source,
      checks,
      mismatches,
      summary,
      partnerConfigError: configError,
      gateResult: this.toGateResult(summary, mismatches),
    };
  }

  private toGateResult(summary: IcMatchSummary, mismatches: readonly ICMismatch[]): GateCheckResult {
    if (summary.partnerCount === 0) {
      return { gateName: IC_GATE_NAME, passed: true, reason: "No IC partners found." };
    }
    const skipped = summary.unreadableCount > 0 ? describeSkipped(summary.unreadableCount) : undefined;
    if (mismatches.length === 0) {
      const reason = "All IC pairs within tolerance.";
      return {
        gateName: IC_GATE_NAME,
        passed: true,
        reason: skipped === undefined ? reason : `${reason} ${skipped}`,
      };
    }
    const described = describeMismatches(mismatches, this.tolerance);
    return {
      gateName: IC_GATE_NAME,
      passed: false,
      reason: skipped === undefined ? described : `${described}\n${skipped}`,
    };
  }
}

// =============================================================================
// Formatting
// =============================================================================

/** One line per mismatch: partner, pair type, both amounts and the difference. */
export function describeMismatch(mismatch: ICMismatch): string {
  return (
    `Partner: ${mismatch.partnerEntity}, Type: ${mismatch.pairType}, ` +
    `Entity Amount: ${formatAmount(mismatch.entityAmount)}, ` +
    `Partner Amount: ${formatAmount(mismatch.partnerAmount)}, ` +
    `Difference: ${formatAmount(mismatch.difference)}`
  );
}

export function describeMismatches(
  mismatches: readonly ICMismatch[],
  tolerance: number = IC_TOLERANCE,
): string {
  const header =
    `IC matching validation failed. ${mismatches.length} pair(s) exceed the ` +
    `$${formatWholeAmount(tolerance)} tolerance threshold:`;
  return [header, ...mismatches.map((m) => `  ${describeMismatch(m)}`)].join("\n");
}

function describeSkipped(count: number): string {
  return `${count} pair(s) could not be read and were skipped.`;
}

// =============================================================================
// Summary Computation
// =============================================================================

function computeSummary(partnerCount: number, checks: readonly IcPairCheck[]): IcMatchSummary {
  let matchedCount = 0;
  let noActivityCount = 0;
  let mismatchCount = 0;
  let unreadableCount = 0;

  for (const check of checks) {
    switch (check.status) {
      case "matched":
        matchedCount++;
        break;
      case "no-activity":
        noActivityCount++;
        break;
      case "mismatch":
        mismatchCount++;
        break;
      case "unreadable":
        unreadableCount++;
        break;
    }
  }

  return {
    partnerCount,
    pairsChecked: checks.length,
    matchedCount,
    noActivityCount,
    mismatchCount,
    unreadableCount,
  };
}
