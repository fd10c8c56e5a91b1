/**
 * Entity ↔ Partner IC Matcher
 *
 * Reads both sides of every reciprocal pair, each tagged with the other
 * entity as its IC counterpart, and compares magnitudes.
 *
 * Detects:
 * - Pairs whose magnitudes differ by more than the tolerance
 * - Pairs with no activity on either side (skipped)
 * - Pairs where a side could not be read (skipped, reported)
 */

import { withAccount, withEntity, withPartner } from "@closegate/types";
import type { ICMismatch, Pov } from "@closegate/types";
import type { CellReader } from "@closegate/cube";
import { exceedsTolerance } from "@closegate/validation";
import type { IcPairCheck, IcPairDefinition } from "./types.js";

/** $500 absolute, applied to the difference of magnitudes. */
export const IC_TOLERANCE = 500;

export const IC_PAIRS: readonly IcPairDefinition[] = Object.freeze([
  { pairType: "AR/AP", entityAccount: "ICReceivables", partnerAccount: "ICPayables" },
  { pairType: "Revenue/COGS", entityAccount: "ICRevenue", partnerAccount: "ICCOGS" },
]);

export class ICMatcher {
  constructor(
    private readonly reader: CellReader,
    private readonly pairs: readonly IcPairDefinition[] = IC_PAIRS,
    private readonly tolerance: number = IC_TOLERANCE,
  ) {}

  /**
   * Check every pair for every partner, concurrently.
   *
   * Checks come back in partner order, then pair order.
   */
  async match(pov: Pov, partners: readonly string[]): Promise<readonly IcPairCheck[]> {
    const work: Promise<IcPairCheck>[] = [];
    for (const partner of partners) {
      for (const pair of this.pairs) {
        work.push(this.checkPair(pov, partner, pair));
      }
    }
    return Promise.all(work);
  }

  private async checkPair(
    pov: Pov,
    partner: string,
    pair: IcPairDefinition,
  ): Promise<IcPairCheck> {
    const entitySide = withPartner(withAccount(pov, pair.entityAccount), partner);
    const partnerSide = withPartner(
      withAccount(withEntity(pov, partner), pair.partnerAccount),
      pov.entity,
    );

    const read = await this.reader.readAll([entitySide, partnerSide]);
    if (!read.ok) {
      return {
        partnerEntity: partner,
        pairType: pair.pairType,
        status: "unreadable",
        error: read.error,
      };
    }

    const [entityAmount = 0, partnerAmount = 0] = read.value;
    if (entityAmount === 0 && partnerAmount === 0) {
      return { partnerEntity: partner, pairType: pair.pairType, status: "no-activity" };
    }

    const difference = Math.abs(Math.abs(entityAmount) - Math.abs(partnerAmount));
    return {
      partnerEntity: partner,
      pairType: pair.pairType,
      status: exceedsTolerance(difference, this.tolerance) ? "mismatch" : "matched",
      entityAmount,
      partnerAmount,
      difference,
    };
  }
}

/** Extract the mismatch records from a list of checks, preserving order. */
export function toMismatches(checks: readonly IcPairCheck[]): readonly ICMismatch[] {
  const mismatches: ICMismatch[] = [];
  for (const check of checks) {
    if (
      check.status === "mismatch" &&
      check.entityAmount !== undefined &&
      check.partnerAmount !== undefined &&
      check.difference !== undefined
    ) {
      mismatches.push({
        partnerEntity: check.partnerEntity,
        pairType: check.pairType,
        entityAmount: check.entityAmount,
        partnerAmount: check.partnerAmount,
        difference: check.difference,
      });
    }
  }
  return mismatches;
}
