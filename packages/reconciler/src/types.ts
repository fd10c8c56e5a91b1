/**
 * @closegate/reconciler domain types.
 *
 * Intercompany reconciliation between an entity and each of its partners:
 * - entity IC receivables ↔ partner IC payables (AR/AP)
 * - entity IC revenue ↔ partner IC COGS (Revenue/COGS)
 */

import type { DataFetchError, GateCheckResult, ICMismatch, IcPairType } from "@closegate/types";

// =============================================================================
// Pair definitions
// =============================================================================

/** Which account each side of a reciprocal pair is read from. */
export interface IcPairDefinition {
  readonly pairType: IcPairType;
  readonly entityAccount: string;
  readonly partnerAccount: string;
}

// =============================================================================
// Match Results
// =============================================================================

export type PairStatus =
  | "matched"        // Both sides agree within tolerance
  | "no-activity"    // Both sides exactly zero
  | "mismatch"       // Difference beyond tolerance
  | "unreadable";    // One side could not be fetched

/** Outcome of checking one pair for one partner. */
export interface IcPairCheck {
  readonly partnerEntity: string;
  readonly pairType: IcPairType;
  readonly status: PairStatus;
  readonly entityAmount?: number | undefined;
  readonly partnerAmount?: number | undefined;
  readonly difference?: number | undefined;
  readonly error?: DataFetchError | undefined;
}

// =============================================================================
// Partner resolution
// =============================================================================

export type PartnerSource =
  | "configured"   // Semicolon list from the config store
  | "directory";   // Every other base entity

export interface ResolvedPartners {
  readonly partners: readonly string[];
  readonly source: PartnerSource;
  /** Set when the configured list could not be read and the directory was used. */
  readonly configError?: DataFetchError | undefined;
}

// =============================================================================
// Reports
// =============================================================================

export interface IcMatchSummary {
  readonly partnerCount: number;
  readonly pairsChecked: number;
  readonly matchedCount: number;
  readonly noActivityCount: number;
  readonly mismatchCount: number;
  readonly unreadableCount: number;
}

export interface IcMatchReport {
  readonly id: string;
  readonly entity: string;
  readonly timestamp: string;
  readonly partnerSource?: PartnerSource | undefined;
  readonly checks: readonly IcPairCheck[];
  /** Every mismatch, in partner then pair order. */
  readonly mismatches: readonly ICMismatch[];
  readonly summary: IcMatchSummary;
  /** Set when the configured partner list could not be read and the directory was used. */
  readonly partnerConfigError?: DataFetchError | undefined;
  /** Set when no partner list could be produced at all. */
  readonly partnerLookupError?: DataFetchError | undefined;
  /** The `ICMatching` gate outcome derived from the mismatch list. */
  readonly gateResult: GateCheckResult;
}
