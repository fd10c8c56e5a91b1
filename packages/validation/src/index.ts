/**
 * @closegate/validation: Data-quality rules and variance maths.
 */

// Catalogs
export {
  TRIAL_BALANCE_ACCOUNTS,
  BALANCE_SHEET_ACCOUNTS,
  REQUIRED_ACCOUNTS,
  INVENTORY_ACCOUNTS,
  REASONABLENESS_ACCOUNTS,
  STATISTICAL_ACCOUNTS,
  COMMENTARY_ACCOUNTS,
  BUDGET_SCAN_ACCOUNTS,
  INCOME_ACCOUNTS,
  REFERENCE_SCENARIO,
} from "./accounts.js";

// Tolerance
export {
  EPSILON,
  exceedsTolerance,
  meetsThreshold,
  formatAmount,
  formatWholeAmount,
  formatPercent,
} from "./tolerance.js";

// Variance
export {
  VARIANCE_PCT_THRESHOLD,
  VARIANCE_AMT_THRESHOLD,
  computeVariance,
  isMaterialVariance,
} from "./variance.js";
export type { Variance } from "./variance.js";

// Rules
export {
  TRIAL_BALANCE_TOLERANCE,
  BALANCE_SHEET_TOLERANCE,
  CASH_OVERDRAFT_LIMIT,
  trialBalanceRule,
  balanceSheetRule,
  requiredAccountsRule,
  inventorySignRule,
  reasonablenessRule,
  statisticalDataRule,
  DEFAULT_RULES,
} from "./rules.js";
export type { ValidationRule, RuleOutcome } from "./rules.js";

export { ValidationRuleSet, hasCritical, summarize, criticalReasons } from "./rule-set.js";
export type { RuleResultListener, ValidationSummary } from "./rule-set.js";

// Budget scan
export {
  BudgetVarianceScanner,
  isFavorableVariance,
  summarizeAlerts,
} from "./budget-scanner.js";
export type { BudgetScanResult, UnreadableAccount } from "./budget-scanner.js";
