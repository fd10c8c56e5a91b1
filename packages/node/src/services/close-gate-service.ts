/**
 * CloseGateService: Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Decisions come from the gate package; this is where
 * their events are written to the audit trail and turned into notifications.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  BudgetAlert,
  ICMismatch,
  Pov,
  SubmissionContext,
  SubmissionDecision,
  ValidationResult,
  WorkflowAction,
  NotificationKind,
} from "@closegate/types";
import { CellReader, ConfigKeys, FlagValues } from "@closegate/cube";
import type { ConfigStore, DataCellRepository, EntityDirectory } from "@closegate/cube";
import {
  BudgetVarianceScanner,
  ValidationRuleSet,
  criticalReasons,
  hasCritical,
  summarize,
  summarizeAlerts,
} from "@closegate/validation";
import type { UnreadableAccount, ValidationSummary } from "@closegate/validation";
import { IcReconciler, describeMismatch } from "@closegate/reconciler";
import type { IcMatchReport } from "@closegate/reconciler";
import { SubmissionError, SubmissionGateController, icDiagnostics } from "@closegate/gate";
import type { EvaluateOptions, EvaluationEvent, IcDiagnosticEvent, SubmissionEvaluation } from "@closegate/gate";
import {
  AuditLogger,
  CompositeLogSink,
  InMemoryLogSink,
  captureAuditContext,
} from "@closegate/audit";
import type { AuditContext, AuditQuery, LogSink, ParsedLogEntry, SystemEvent } from "@closegate/audit";
import { inferNotificationKind } from "@closegate/notify";
import type { DispatchReport, NotificationDispatcher, NotificationEvent } from "@closegate/notify";

// =============================================================================
// Configuration
// =============================================================================

export interface CloseGateServiceConfig {
  readonly repository: DataCellRepository;
  readonly config: ConfigStore;
  readonly entities: EntityDirectory;
  readonly notifier: NotificationDispatcher;
  /** Written alongside the queryable in-memory trail. */
  readonly auditSinks?: readonly LogSink[] | undefined;
  readonly evaluationTimeoutMs?: number | undefined;
  readonly clock?: (() => Date) | undefined;
  /** Host name for audit entries; the OS host name when omitted. */
  readonly machine?: (() => string) | undefined;
  readonly logger?: Logger | undefined;
}

/** Who ran an operation, for which POV. */
export interface OperationInput {
  readonly pov: Pov;
  readonly user: string;
  readonly sessionId?: string | undefined;
}

export interface DataQualityRun {
  readonly pov: Pov;
  readonly status: typeof FlagValues.passed | typeof FlagValues.failed;
  readonly results: readonly ValidationResult[];
  readonly summary: ValidationSummary;
  readonly flagWritten: boolean;
}

export interface BudgetScan {
  readonly pov: Pov;
  readonly alerts: readonly BudgetAlert[];
  readonly unreadable: readonly UnreadableAccount[];
  readonly summary: string;
  readonly reviewFlagSet: boolean;
}

export interface WorkflowActionInput extends OperationInput {
  readonly action: WorkflowAction;
  readonly fromStatus: string;
  readonly toStatus: string;
  readonly comments?: string | undefined;
}

export type AuditEventInput =
  | { readonly type: "data-change"; readonly account: string; readonly oldValue: number; readonly newValue: number }
  | { readonly type: "system-event"; readonly event: SystemEvent }
  | { readonly type: "generic"; readonly eventType: string; readonly details: string };

// =============================================================================
// Service
// =============================================================================

export class CloseGateService {
  readonly reader: CellReader;
  readonly ruleSet: ValidationRuleSet;
  readonly reconciler: IcReconciler;
  readonly scanner: BudgetVarianceScanner;
  readonly controller: SubmissionGateController;
  readonly auditTrail: InMemoryLogSink;
  readonly audit: AuditLogger;

  private readonly config: ConfigStore;
  private readonly notifier: NotificationDispatcher;
  private readonly clock: () => Date;
  private readonly machine: (() => string) | undefined;
  private readonly logger: Logger;

  constructor(config: CloseGateServiceConfig) {
    this.config = config.config;
    this.notifier = config.notifier;
    this.clock = config.clock ?? (() => new Date());
    this.machine = config.machine;
    this.logger = config.logger ?? pino({ level: "silent" });

    this.reader = new CellReader(config.repository);
    this.ruleSet = new ValidationRuleSet(this.reader);
    this.reconciler = new IcReconciler({ reader: this.reader, config: config.config, entities: config.entities });
    this.scanner = new BudgetVarianceScanner(this.reader);
    this.controller = new SubmissionGateController({
      reader: this.reader,
      config: config.config,
      reconciler: this.reconciler,
      ruleSet: this.ruleSet,
      timeoutMs: config.evaluationTimeoutMs,
      clock: this.clock,
      logger: this.logger,
    });

    this.auditTrail = new InMemoryLogSink();
    this.audit = new AuditLogger({
      sink: new CompositeLogSink([this.auditTrail, ...(config.auditSinks ?? [])]),
      fallback: (message, cause) => this.logger.error({ err: cause }, message),
    });
  }

  // ─── Submission gate ───────────────────────────────────────────────

  /**
   * Evaluate a transition attempt and audit every result and the decision.
   *
   * @throws {SubmissionError} INVALID_CONTEXT / INVALID_POV for malformed
   *   input, EVALUATION_ABORTED once an aborted evaluation has been audited
   */
  async evaluate(context: SubmissionContext, options: EvaluateOptions = {}): Promise<SubmissionEvaluation> {
    const evaluation = await this.controller.evaluate(context, options);
    const ctx = this.auditContext(evaluation.context);

    for (const event of evaluation.events) {
      this.auditEvaluationEvent(ctx, evaluation, event);
    }

    const { outcome } = evaluation;
    if (outcome.kind === "aborted") {
      throw new SubmissionError("EVALUATION_ABORTED", outcome.reason, {
        digest: evaluation.digest,
        settledRules: evaluation.validationResults.length,
        settledGates: evaluation.gateResults.length,
      });
    }

    this.logger.info(
      { pov: evaluation.context.pov, outcome: outcome.kind, digest: evaluation.digest },
      "Submission evaluated",
    );
    return evaluation;
  }

  /** Workflow-engine entry point: Allow, or Reject with the reasons to show. */
  async evaluateSubmission(context: SubmissionContext, options: EvaluateOptions = {}): Promise<SubmissionDecision> {
    const { outcome } = await this.evaluate(context, options);
    return outcome.kind === "reject" ? { kind: "reject", reasons: outcome.reasons } : { kind: "allow" };
  }

  // ─── Notifications ─────────────────────────────────────────────────

  /** Fire-and-forget. The dispatch outcome is audited once it settles. */
  notify(event: NotificationEvent, sessionId?: string): void {
    const ctx = this.auditContext({ user: event.actor ?? "system", pov: event.pov, sessionId });
    this.notifier.notify(event, (report) => this.auditNotification(ctx, report));
  }

  // ─── Data quality ──────────────────────────────────────────────────

  /**
   * Run the validation rules, record `passed`/`failed` for the gate to read
   * and alert the data steward about critical results.
   */
  async runDataQualityChecks(input: OperationInput): Promise<DataQualityRun> {
    const { pov } = input;
    const ctx = this.auditContext(input);
    const results = await this.ruleSet.evaluate(pov);
    const failed = hasCritical(results);
    const status = failed ? FlagValues.failed : FlagValues.passed;

    for (const result of results) {
      this.audit.logValidationResult(ctx, result);
    }

    const flagWritten = await this.writeFlag(ConfigKeys.dataQualityStatus(pov.entity, pov.period), status);

    if (failed) {
      this.notify(
        {
          kind: "data-quality",
          pov,
          actor: input.user,
          extraFields: { failureDetails: criticalReasons(results).join("\n") },
        },
        input.sessionId,
      );
    }

    return { pov, status, results, summary: summarize(results), flagWritten };
  }

  // ─── IC matching ───────────────────────────────────────────────────

  /** Standalone IC run: audits each mismatch and alerts both controllers per partner. */
  async runIcMatching(input: OperationInput): Promise<IcMatchReport> {
    const ctx = this.auditContext(input);
    const report = await this.reconciler.reconcile(input.pov);

    if (report.partnerLookupError !== undefined) {
      this.logger.warn({ entity: report.entity, err: report.partnerLookupError }, "IC partner lookup failed");
    }
    for (const event of icDiagnostics(report)) {
      this.auditIcDiagnostic(ctx, event);
    }

    for (const mismatch of report.mismatches) {
      this.audit.logIcMismatch(ctx, mismatch);
    }

    for (const [partner, mismatches] of groupByPartner(report.mismatches)) {
      this.notify(
        {
          kind: "ic-mismatch",
          pov: input.pov,
          actor: input.user,
          extraFields: {
            partnerEntity: partner,
            mismatchDetails: mismatches.map(describeMismatch).join("\n"),
          },
        },
        input.sessionId,
      );
    }

    return report;
  }

  // ─── Budget variance ───────────────────────────────────────────────

  /** Advisory: alerts are audited and flag the period for management review. */
  async scanBudgetVariances(input: OperationInput): Promise<BudgetScan> {
    const { pov } = input;
    const ctx = this.auditContext(input);
    const { alerts, unreadable } = await this.scanner.scan(pov);

    for (const alert of alerts) {
      this.audit.logBudgetAlert(ctx, alert);
    }
    for (const { account, error } of unreadable) {
      this.logger.warn({ pov, account: account.code, err: error }, "Budget variance account unreadable");
    }

    const summary = summarizeAlerts(alerts, pov.entity, pov.period);
    let reviewFlagSet = false;
    if (alerts.length > 0) {
      this.audit.logGenericEvent(ctx, "BudgetVarianceScan", summary);
      reviewFlagSet = await this.writeFlag(
        ConfigKeys.managementReview(pov.entity, pov.period, pov.scenario),
        FlagValues.reviewRequired,
      );
    }

    return { pov, alerts, unreadable, summary, reviewFlagSet };
  }

  // ─── Workflow & audit ──────────────────────────────────────────────

  /** Audit a workflow action and raise the notification it implies. */
  recordWorkflowAction(input: WorkflowActionInput): NotificationKind | undefined {
    const ctx = this.auditContext(input);
    this.audit.logWorkflowAction(ctx, {
      action: input.action,
      fromStatus: input.fromStatus,
      toStatus: input.toStatus,
      comments: input.comments,
    });

    const kind = inferNotificationKind(input.action);
    if (kind !== undefined) {
      const reason = kind === "rejection" ? input.comments : undefined;
      this.notify(
        {
          kind,
          pov: input.pov,
          actor: input.user,
          extraFields: reason !== undefined && reason.length > 0 ? { rejectionReason: reason } : {},
        },
        input.sessionId,
      );
    }
    return kind;
  }

  recordAuditEvent(input: OperationInput, event: AuditEventInput): void {
    const ctx = this.auditContext(input);
    switch (event.type) {
      case "data-change":
        this.audit.logDataChange(ctx, event);
        return;
      case "system-event":
        this.audit.logSystemEvent(ctx, event.event);
        return;
      case "generic":
        this.audit.logGenericEvent(ctx, event.eventType, event.details);
        return;
    }
  }

  queryAudit(query?: AuditQuery): readonly ParsedLogEntry[] {
    return this.auditTrail.query(query);
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private auditContext(input: {
    readonly user: string;
    readonly pov?: Pov | undefined;
    readonly sessionId?: string | undefined;
  }): AuditContext {
    return captureAuditContext(input, { clock: this.clock, machine: this.machine });
  }

  private auditEvaluationEvent(ctx: AuditContext, evaluation: SubmissionEvaluation, event: EvaluationEvent): void {
    switch (event.type) {
      case "evaluation-started":
        this.audit.logGenericEvent(
          ctx,
          "SubmissionEvaluationStarted",
          `transition=${event.context.transitionKind} startedAt=${event.at}`,
        );
        return;
      case "flags-read":
        this.audit.logGenericEvent(ctx, "WorkflowFlagsRead", `readAt=${event.readAt}`);
        return;
      case "validation-result":
        this.audit.logValidationResult(ctx, event.result);
        return;
      case "ic-pair-unreadable":
      case "ic-partners-fallback":
        this.auditIcDiagnostic(ctx, event);
        return;
      case "gate-result":
        this.audit.logGateResult(ctx, event.result);
        return;
      case "evaluation-decided": {
        const { outcome } = event;
        this.audit.logGateDecision(ctx, {
          transitionKind: evaluation.context.transitionKind,
          outcome: outcome.kind,
          reasons:
            outcome.kind === "reject" ? outcome.reasons : outcome.kind === "aborted" ? [outcome.reason] : [],
          digest: event.digest,
          durationMs: event.durationMs,
        });
        return;
      }
    }
  }

  /** IC checks that could not run are skipped, not failed; keep them visible. */
  private auditIcDiagnostic(ctx: AuditContext, event: IcDiagnosticEvent): void {
    if (event.type === "ic-pair-unreadable") {
      this.logger.warn(
        { entity: ctx.entity, period: ctx.period, partnerEntity: event.partnerEntity, pairType: event.pairType, err: event.error },
        "IC pair unreadable, skipped",
      );
      this.audit.logGenericEvent(
        ctx,
        "IcPairUnreadable",
        `partner=${event.partnerEntity} pair=${event.pairType} error=${event.error.message}`,
      );
      return;
    }
    this.logger.warn({ entity: ctx.entity, period: ctx.period, err: event.error }, "IC partner list unreadable, using entity directory");
    this.audit.logGenericEvent(ctx, "IcPartnerConfigError", `error=${event.error.message}`);
  }

  private auditNotification(ctx: AuditContext, report: DispatchReport): void {
    const delivered = report.attempts.filter((a) => a.delivered).length;
    this.audit.logNotification(ctx, {
      kind: report.kind,
      recipients: report.recipients,
      delivered,
      failed: report.attempts.length - delivered,
    });
  }

  /** Flags are written by separately-triggered runs; a failed write is reported, not thrown. */
  private async writeFlag(key: string, value: string): Promise<boolean> {
    try {
      await this.config.set(key, value);
      return true;
    } catch (cause: unknown) {
      this.logger.error({ key, err: cause }, "Workflow flag write failed");
      return false;
    }
  }
}

function groupByPartner(mismatches: readonly ICMismatch[]): Map<string, ICMismatch[]> {
  const groups = new Map<string, ICMismatch[]>();
  for (const mismatch of mismatches) {
    const group = groups.get(mismatch.partnerEntity);
    if (group === undefined) {
      groups.set(mismatch.partnerEntity, [mismatch]);
    } else {
      group.push(mismatch);
    }
  }
  return groups;
}
