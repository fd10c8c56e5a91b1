/**
 * BudgetVarianceScanner
 *
 * Compares the POV's scenario against Budget for the budget-scan accounts and
 * produces a BudgetAlert for every material variance. Alerts are advisory:
 * they never feed the submission decision.
 */

import { withAccount, withScenario } from "@closegate/types";
import type { AccountDefinition, BudgetAlert, DataFetchError, Pov } from "@closegate/types";
import type { CellReader } from "@closegate/cube";
import { BUDGET_SCAN_ACCOUNTS, INCOME_ACCOUNTS, REFERENCE_SCENARIO } from "./accounts.js";
import { formatPercent, formatWholeAmount } from "./tolerance.js";
import { computeVariance, isMaterialVariance } from "./variance.js";

export interface UnreadableAccount {
  readonly account: AccountDefinition;
  readonly error: DataFetchError;
}

export interface BudgetScanResult {
  readonly alerts: readonly BudgetAlert[];
  /** Accounts skipped because one side could not be read. */
  readonly unreadable: readonly UnreadableAccount[];
}

/** Above budget is favorable for income lines, below budget for the rest. */
export function isFavorableVariance(accountCode: string, varianceAmount: number): boolean {
  return INCOME_ACCOUNTS.has(accountCode.toLowerCase())
    ? varianceAmount >= 0
    : varianceAmount <= 0;
}

export class BudgetVarianceScanner {
  constructor(
    private readonly reader: CellReader,
    private readonly accounts: readonly AccountDefinition[] = BUDGET_SCAN_ACCOUNTS,
  ) {}

  async scan(pov: Pov): Promise<BudgetScanResult> {
    const reference = withScenario(pov, REFERENCE_SCENARIO);

    const reads = await Promise.all(
      this.accounts.map((account) =>
        this.reader.readAll([withAccount(pov, account.code), withAccount(reference, account.code)]),
      ),
    );

    const alerts: BudgetAlert[] = [];
    const unreadable: UnreadableAccount[] = [];

    reads.forEach((read, i) => {
      const account = this.accounts[i];
      if (account === undefined) return;
      if (!read.ok) {
        unreadable.push({ account, error: read.error });
        return;
      }

      const [current = 0, budget = 0] = read.value;
      const variance = computeVariance(current, budget);
      if (!isMaterialVariance(variance)) return;

      alerts.push({
        accountCode: account.code,
        accountName: account.name,
        currentValue: current,
        budgetValue: budget,
        varianceAmount: variance.amount,
        variancePercent: variance.percent,
        isFavorable: isFavorableVariance(account.code, variance.amount),
      });
    });

    return { alerts, unreadable };
  }
}

/**
 * Human-readable scan summary, e.g.
 *
 *   2 budget variance alert(s) generated for Plant01 / 2024M1:
 *     Revenue: Var 20,000 (20.0%) [FAV]
 */
export function summarizeAlerts(
  alerts: readonly BudgetAlert[],
  entity: string,
  period: string,
): string {
  const lines = [`${alerts.length} budget variance alert(s) generated for ${entity} / ${period}:`];
  for (const alert of alerts) {
    const direction = alert.isFavorable ? "FAV" : "UNFAV";
    lines.push(
      `  ${alert.accountName}: Var ${formatWholeAmount(alert.varianceAmount)} ` +
        `(${formatPercent(alert.variancePercent)}) [${direction}]`,
    );
  }
  return lines.join("\n");
}
