/**
 * Financial records produced by the reconciliation and variance checks.
 */

/** An account code with its display name. */
export interface AccountDefinition {
  readonly code: string;
  readonly name: string;
}

/** Reciprocal balance pairs checked between intercompany partners. */
export type IcPairType = "AR/AP" | "Revenue/COGS";

/**
 * Created only when `|entityAmount|` and `|partnerAmount|` differ beyond
 * tolerance and the pair is not both zero.
 */
export interface ICMismatch {
  readonly partnerEntity: string;
  readonly pairType: IcPairType;
  readonly entityAmount: number;
  readonly partnerAmount: number;
  readonly difference: number;
}

export interface BudgetAlert {
  readonly accountCode: string;
  readonly accountName: string;
  readonly currentValue: number;
  readonly budgetValue: number;
  /** Signed: current minus budget. */
  readonly varianceAmount: number;
  /** Signed fraction of |budget|; 0 when the budget is 0. */
  readonly variancePercent: number;
  readonly isFavorable: boolean;
}
