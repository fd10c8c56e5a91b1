/**
 * Account catalogs used by the validation rules, the submission gates and
 * the budget variance scan.
 */

import type { AccountDefinition } from "@closegate/types";

function account(code: string, name: string = code): AccountDefinition {
  return Object.freeze({ code, name });
}

export const TRIAL_BALANCE_ACCOUNTS = {
  debits: "TotalDebits",
  credits: "TotalCredits",
} as const;

export const BALANCE_SHEET_ACCOUNTS = {
  assets: "TotalAssets",
  liabilities: "TotalLiabilities",
  equity: "TotalEquity",
} as const;

/** Must each hold a non-zero value before a period can close. */
export const REQUIRED_ACCOUNTS: readonly AccountDefinition[] = Object.freeze([
  account("Revenue"),
  account("COGS", "Cost of Goods Sold"),
  account("GrossProfit", "Gross Profit"),
  account("OperatingExpenses", "Operating Expenses"),
]);

/** Must never be negative. */
export const INVENTORY_ACCOUNTS: readonly string[] = Object.freeze([
  "RawMaterials",
  "WorkInProcess",
  "FinishedGoods",
  "TotalInventory",
]);

export const REASONABLENESS_ACCOUNTS = {
  revenue: "Revenue",
  cogs: "COGS",
  cash: "CashAndEquivalents",
} as const;

export const STATISTICAL_ACCOUNTS: readonly AccountDefinition[] = Object.freeze([
  account("STAT_Headcount", "Headcount"),
  account("STAT_FTE", "FTE Count"),
  account("STAT_ProductionVolume", "Production Volume"),
]);

/** P&L lines whose material variances need written commentary. */
export const COMMENTARY_ACCOUNTS: readonly string[] = Object.freeze([
  "Revenue",
  "COGS",
  "GrossProfit",
  "OperatingExpenses",
  "NetIncome",
]);

export const BUDGET_SCAN_ACCOUNTS: readonly AccountDefinition[] = Object.freeze([
  account("Revenue"),
  account("COGS", "Cost of Goods Sold"),
  account("GrossProfit", "Gross Profit"),
  account("OperatingExpenses", "Operating Expenses"),
  account("SGA", "SG&A Expenses"),
  account("RandD", "R&D Expenses"),
  account("EBITDA"),
  account("NetIncome", "Net Income"),
  account("CAPEX", "Capital Expenditure"),
  account("TotalAssets", "Total Assets"),
]);

/** Accounts where coming in above budget is good news. */
export const INCOME_ACCOUNTS: ReadonlySet<string> = new Set([
  "revenue",
  "grossprofit",
  "ebitda",
  "netincome",
]);

/** Scenario every variance is measured against. */
export const REFERENCE_SCENARIO = "Budget";
