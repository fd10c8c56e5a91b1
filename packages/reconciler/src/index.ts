/**
 * @closegate/reconciler: Intercompany reconciliation.
 *
 * Matches an entity's reciprocal IC balances against each partner:
 * 1. Entity IC receivables ↔ partner IC payables
 * 2. Entity IC revenue ↔ partner IC COGS
 *
 * A pair with no activity on either side is skipped; a pair whose side cannot
 * be read is reported but never counted as a mismatch.
 */

// Reconciler (top-level coordinator)
export {
  IcReconciler,
  IC_GATE_NAME,
  describeMismatch,
  describeMismatches,
} from "./reconciler.js";
export type { IcReconcilerConfig } from "./reconciler.js";

// Matcher
export { ICMatcher, IC_PAIRS, IC_TOLERANCE, toMismatches } from "./ic-matcher.js";

// Partners
export { PartnerResolver, parsePartnerList } from "./partners.js";

// Types
export type {
  IcPairDefinition,
  IcPairCheck,
  PairStatus,
  PartnerSource,
  ResolvedPartners,
  IcMatchSummary,
  IcMatchReport,
} from "./types.js";
