/**
 * Response shapes for domain records that carry Error instances.
 */

import type { DataFetchError } from "@closegate/types";
import type { IcMatchReport } from "@closegate/reconciler";
import type { BudgetScan } from "../services/close-gate-service.js";

export interface ErrorDto {
  readonly code: string;
  readonly message: string;
}

function presentError(error: DataFetchError): ErrorDto {
  return { code: error.code, message: error.message };
}

export function presentIcReport(report: IcMatchReport) {
  return {
    ...report,
    checks: report.checks.map(({ error, ...check }) =>
      error !== undefined ? { ...check, error: presentError(error) } : check,
    ),
    partnerConfigError:
      report.partnerConfigError !== undefined ? presentError(report.partnerConfigError) : undefined,
    partnerLookupError:
      report.partnerLookupError !== undefined ? presentError(report.partnerLookupError) : undefined,
  };
}

export function presentBudgetScan(scan: BudgetScan) {
  return {
    ...scan,
    unreadable: scan.unreadable.map(({ account, error }) => ({ account, error: presentError(error) })),
  };
}
