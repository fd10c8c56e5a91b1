/**
 * Validation rules.
 *
 * Each rule reads the cells it needs and returns exactly one
 * ValidationResult, or the DataFetchError that prevented it from deciding.
 * Rules never throw and never decide what a fetch failure means; the rule
 * set applies that policy.
 */

import { ok, withAccount } from "@closegate/types";
import type { DataFetchError, Pov, Result, ValidationResult } from "@closegate/types";
import type { CellReader } from "@closegate/cube";
import {
  BALANCE_SHEET_ACCOUNTS,
  INVENTORY_ACCOUNTS,
  REASONABLENESS_ACCOUNTS,
  REQUIRED_ACCOUNTS,
  STATISTICAL_ACCOUNTS,
  TRIAL_BALANCE_ACCOUNTS,
} from "./accounts.js";
import { exceedsTolerance, formatAmount } from "./tolerance.js";

// =============================================================================
// Rule shape
// =============================================================================

export type RuleOutcome = Result<ValidationResult, DataFetchError>;

export interface ValidationRule {
  /** Name carried by every result the rule produces. */
  readonly name: string;
  /** Lower-case noun used in the fetch-failure warning. */
  readonly subject: string;
  check(reader: CellReader, pov: Pov): Promise<RuleOutcome>;
}

// =============================================================================
// Tolerances
// =============================================================================

export const TRIAL_BALANCE_TOLERANCE = 0.01;
export const BALANCE_SHEET_TOLERANCE = 1.0;
/** Cash below this is flagged as a likely overdraft. */
export const CASH_OVERDRAFT_LIMIT = -1_000_000;

function result(
  ruleName: string,
  severity: ValidationResult["severity"],
  message: string,
): RuleOutcome {
  return ok({ ruleName, severity, message });
}

function readAccounts(
  reader: CellReader,
  pov: Pov,
  accounts: readonly string[],
): Promise<Result<readonly number[], DataFetchError>> {
  return reader.readAll(accounts.map((code) => withAccount(pov, code)));
}

// =============================================================================
// Rules
// =============================================================================

export const trialBalanceRule: ValidationRule = {
  name: "TrialBalance",
  subject: "trial balance",
  async check(reader, pov) {
    const read = await readAccounts(reader, pov, [
      TRIAL_BALANCE_ACCOUNTS.debits,
      TRIAL_BALANCE_ACCOUNTS.credits,
    ]);
    if (!read.ok) return read;

    const [debits = 0, credits = 0] = read.value;
    const difference = Math.abs(debits - credits);

    if (exceedsTolerance(difference, TRIAL_BALANCE_TOLERANCE)) {
      return result(
        "TrialBalance",
        "critical",
        `Trial balance out of balance by ${formatAmount(difference)}. ` +
          `Debits=${formatAmount(debits)}, Credits=${formatAmount(credits)}`,
      );
    }
    return result("TrialBalance", "pass", "Trial balance in balance.");
  },
};

export const balanceSheetRule: ValidationRule = {
  name: "BalanceSheet",
  subject: "balance sheet",
  async check(reader, pov) {
    const read = await readAccounts(reader, pov, [
      BALANCE_SHEET_ACCOUNTS.assets,
      BALANCE_SHEET_ACCOUNTS.liabilities,
      BALANCE_SHEET_ACCOUNTS.equity,
    ]);
    if (!read.ok) return read;

    const [assets = 0, liabilities = 0, equity = 0] = read.value;
    const liabilitiesAndEquity = liabilities + equity;
    const difference = Math.abs(assets - liabilitiesAndEquity);

    if (exceedsTolerance(difference, BALANCE_SHEET_TOLERANCE)) {
      return result(
        "BalanceSheet",
        "critical",
        `Balance sheet out of balance by ${formatAmount(difference)}. ` +
          `Assets=${formatAmount(assets)}, L+E=${formatAmount(liabilitiesAndEquity)}`,
      );
    }
    return result("BalanceSheet", "pass", "Balance sheet in balance.");
  },
};

export const requiredAccountsRule: ValidationRule = {
  name: "RequiredAccounts",
  subject: "required accounts",
  async check(reader, pov) {
    const read = await readAccounts(
      reader,
      pov,
      REQUIRED_ACCOUNTS.map((a) => a.code),
    );
    if (!read.ok) return read;

    const missing = REQUIRED_ACCOUNTS.filter((_, i) => read.value[i] === 0).map((a) => a.name);

    if (missing.length > 0) {
      return result("RequiredAccounts", "critical", `Missing required account values: ${missing.join(", ")}`);
    }
    return result("RequiredAccounts", "pass", "All required accounts populated.");
  },
};

export const inventorySignRule: ValidationRule = {
  name: "InventorySign",
  subject: "inventory signs",
  async check(reader, pov) {
    const read = await readAccounts(reader, pov, INVENTORY_ACCOUNTS);
    if (!read.ok) return read;

    const negative: string[] = [];
    INVENTORY_ACCOUNTS.forEach((code, i) => {
      const value = read.value[i] ?? 0;
      if (value < 0) {
        negative.push(`${code} (${formatAmount(value)})`);
      }
    });

    if (negative.length > 0) {
      return result("InventorySign", "critical", `Negative inventory balances found: ${negative.join(", ")}`);
    }
    return result("InventorySign", "pass", "No negative inventory balances.");
  },
};

/** Heuristics only: never more severe than a warning. */
export const reasonablenessRule: ValidationRule = {
  name: "AccountReasonableness",
  subject: "account reasonableness",
  async check(reader, pov) {
    const read = await readAccounts(reader, pov, [
      REASONABLENESS_ACCOUNTS.revenue,
      REASONABLENESS_ACCOUNTS.cogs,
      REASONABLENESS_ACCOUNTS.cash,
    ]);
    if (!read.ok) return read;

    const [revenue = 0, cogs = 0, cash = 0] = read.value;
    const issues: string[] = [];

    if (revenue < 0) {
      issues.push(`Revenue is negative (${formatAmount(revenue)})`);
    }
    if (cogs < 0) {
      issues.push(`COGS is negative (${formatAmount(cogs)}) - possible sign error`);
    }
    if (cash < CASH_OVERDRAFT_LIMIT) {
      issues.push(`Cash is significantly negative (${formatAmount(cash)})`);
    }

    if (issues.length > 0) {
      return result("AccountReasonableness", "warning", `Reasonableness concerns: ${issues.join("; ")}`);
    }
    return result("AccountReasonableness", "pass", "All accounts pass reasonableness checks.");
  },
};

/** Statistical gaps warn but never block. */
export const statisticalDataRule: ValidationRule = {
  name: "StatisticalData",
  subject: "statistical data",
  async check(reader, pov) {
    const read = await readAccounts(
      reader,
      pov,
      STATISTICAL_ACCOUNTS.map((a) => a.code),
    );
    if (!read.ok) return read;

    const missing = STATISTICAL_ACCOUNTS.filter((_, i) => read.value[i] === 0).map((a) => a.name);

    if (missing.length > 0) {
      return result("StatisticalData", "warning", `Missing statistical data: ${missing.join(", ")}`);
    }
    return result("StatisticalData", "pass", "All statistical data populated.");
  },
};

/** Every rule, in reporting order. */
export const DEFAULT_RULES: readonly ValidationRule[] = Object.freeze([
  trialBalanceRule,
  balanceSheetRule,
  requiredAccountsRule,
  inventorySignRule,
  reasonablenessRule,
  statisticalDataRule,
]);
