/**
 * AuditLogger: one entry per notable event, written to a LogSink.
 *
 * No method throws. A failed build or append is counted and reported to the
 * fallback callback; a failing fallback is counted too and goes no further.
 */

import type {
  BudgetAlert,
  GateCheckResult,
  ICMismatch,
  NotificationKind,
  TransitionKind,
  ValidationResult,
  WorkflowAction,
} from "@closegate/types";
import { formatAmount, formatPercent } from "@closegate/validation";
import { buildLogEntry } from "./entry.js";
import type { AuditCategory, AuditContext, AuditFields, LogSink } from "./types.js";

// =============================================================================
// Event payloads
// =============================================================================

export type SystemEventType = "consolidation" | "translation" | "data-load";

export interface DataChangeEvent {
  readonly account: string;
  readonly oldValue: number;
  readonly newValue: number;
}

export interface WorkflowActionEvent {
  readonly action: WorkflowAction;
  readonly fromStatus: string;
  readonly toStatus: string;
  readonly comments?: string | undefined;
}

export interface SystemEvent {
  readonly type: SystemEventType;
  readonly status?: string | undefined;
  readonly details?: string | undefined;
}

export interface GateDecisionEvent {
  readonly transitionKind: TransitionKind;
  readonly outcome: "allow" | "reject" | "aborted";
  readonly reasons: readonly string[];
  readonly digest: string;
  readonly durationMs: number;
}

export interface NotificationAuditEvent {
  readonly kind: NotificationKind;
  readonly recipients: number;
  readonly delivered: number;
  readonly failed: number;
}

export type AuditFallback = (message: string, cause: unknown) => void;

export interface AuditLoggerOptions {
  readonly sink: LogSink;
  readonly fallback?: AuditFallback | undefined;
}

// =============================================================================
// AuditLogger
// =============================================================================

export class AuditLogger {
  private readonly sink: LogSink;
  private readonly fallback: AuditFallback | undefined;
  private _dropped = 0;
  private _fallbackFailures = 0;

  constructor(options: AuditLoggerOptions) {
    this.sink = options.sink;
    this.fallback = options.fallback;
  }

  logDataChange(ctx: AuditContext, event: DataChangeEvent): void {
    this.write("DATA_CHANGE", ctx, [
      ["Account", event.account],
      ["OldValue", formatAmount(event.oldValue)],
      ["NewValue", formatAmount(event.newValue)],
      ["ChangeAmount", formatAmount(event.newValue - event.oldValue)],
    ]);
  }

  logWorkflowAction(ctx: AuditContext, event: WorkflowActionEvent): void {
    this.write("WORKFLOW_ACTION", ctx, [
      ["Action", event.action],
      ["FromStatus", event.fromStatus],
      ["ToStatus", event.toStatus],
      ["Comments", event.comments ?? ""],
    ]);
  }

  logSystemEvent(ctx: AuditContext, event: SystemEvent): void {
    this.write("SYSTEM_EVENT", ctx, [
      ["EventSubType", event.type],
      ["Status", event.status ?? "Started"],
      ["Details", event.details ?? ""],
    ]);
  }

  logGenericEvent(ctx: AuditContext, eventType: string, details: string): void {
    this.write("GENERIC_EVENT", ctx, [
      ["EventType", eventType],
      ["Details", details],
    ]);
  }

  logGateDecision(ctx: AuditContext, event: GateDecisionEvent): void {
    this.write("GATE_DECISION", ctx, [
      ["TransitionKind", event.transitionKind],
      ["Outcome", event.outcome],
      ["ReasonCount", String(event.reasons.length)],
      ["Reasons", event.reasons.join("; ")],
      ["Digest", event.digest],
      ["DurationMs", String(event.durationMs)],
    ]);
  }

  logValidationResult(ctx: AuditContext, result: ValidationResult): void {
    this.write("VALIDATION_RESULT", ctx, [
      ["Rule", result.ruleName],
      ["Severity", result.severity.toUpperCase()],
      ["Message", result.message],
    ]);
  }

  logGateResult(ctx: AuditContext, result: GateCheckResult): void {
    this.write("GATE_RESULT", ctx, [
      ["Gate", result.gateName],
      ["Passed", String(result.passed)],
      ["Reason", result.reason],
    ]);
  }

  logIcMismatch(ctx: AuditContext, mismatch: ICMismatch): void {
    this.write("IC_MISMATCH", ctx, [
      ["Partner", mismatch.partnerEntity],
      ["PairType", mismatch.pairType],
      ["EntityAmount", formatAmount(mismatch.entityAmount)],
      ["PartnerAmount", formatAmount(mismatch.partnerAmount)],
      ["Difference", formatAmount(mismatch.difference)],
    ]);
  }

  logBudgetAlert(ctx: AuditContext, alert: BudgetAlert): void {
    this.write("BUDGET_ALERT", ctx, [
      ["Account", alert.accountName],
      ["Current", formatAmount(alert.currentValue)],
      ["Budget", formatAmount(alert.budgetValue)],
      ["Variance", formatAmount(alert.varianceAmount)],
      ["VariancePct", formatPercent(alert.variancePercent)],
      ["Favorable", String(alert.isFavorable)],
    ]);
  }

  logNotification(ctx: AuditContext, event: NotificationAuditEvent): void {
    this.write("NOTIFICATION", ctx, [
      ["Kind", event.kind],
      ["Recipients", String(event.recipients)],
      ["Delivered", String(event.delivered)],
      ["Failed", String(event.failed)],
    ]);
  }

  /** Entries lost to a failing sink. */
  get dropped(): number {
    return this._dropped;
  }

  get fallbackFailures(): number {
    return this._fallbackFailures;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private write(category: AuditCategory, ctx: AuditContext, fields: AuditFields): void {
    try {
      this.sink.append(buildLogEntry(category, ctx, fields));
    } catch (cause: unknown) {
      this._dropped++;
      this.reportFailure(category, cause);
    }
  }

  private reportFailure(category: AuditCategory, cause: unknown): void {
    if (this.fallback === undefined) {
      return;
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    try {
      this.fallback(`Audit ${category} entry dropped: ${reason}`, cause);
    } catch {
      this._fallbackFailures++;
    }
  }
}
