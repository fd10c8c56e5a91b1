/**
 * SubmissionGateController
 *
 * Evaluates one transition attempt. Three stages run concurrently and are
 * never short-circuited:
 *
 *   1. ValidationRuleSet over the period's data
 *   2. ICMatching over every partner pair
 *   3. WorkflowFlags read, then the five gates
 *
 * The result is an evaluation record (decision, every result, events and a
 * digest). Nothing here logs to the audit trail or notifies anyone.
 *
 * Cancellation: an external AbortSignal or `timeoutMs` ends the wait early.
 * Results that had settled by then are kept in the returned evaluation with
 * an `aborted` outcome; stages still running are left to finish unobserved.
 */

import pino from "pino";
import type { Logger } from "pino";
import { createPov, isPov, isTransitionKind } from "@closegate/types";
import type {
  GateCheckResult,
  SubmissionContext,
  ValidationResult,
} from "@closegate/types";
import type { CellReader, ConfigStore } from "@closegate/cube";
import { COMMENTARY_ACCOUNTS, ValidationRuleSet } from "@closegate/validation";
import type { IcMatchReport, IcReconciler } from "@closegate/reconciler";
import { GateAggregator, decide } from "./aggregator.js";
import { computeEvaluationDigest } from "./digest.js";
import { SubmissionError } from "./errors.js";
import { WorkflowFlagsAdapter } from "./flags.js";
import type { EvaluationEvent, IcDiagnosticEvent } from "./events.js";
import type { EvaluationOutcome, SubmissionEvaluation } from "./evaluation.js";

// =============================================================================
// Configuration
// =============================================================================

export interface SubmissionGateControllerConfig {
  readonly reader: CellReader;
  readonly config: ConfigStore;
  readonly reconciler: IcReconciler;
  readonly ruleSet?: ValidationRuleSet | undefined;
  readonly aggregator?: GateAggregator | undefined;
  /** Default timeout for every evaluation, in milliseconds. */
  readonly timeoutMs?: number | undefined;
  readonly clock?: (() => Date) | undefined;
  readonly logger?: Logger | undefined;
}

export interface EvaluateOptions {
  readonly signal?: AbortSignal | undefined;
  /** Overrides the controller-wide timeout for this evaluation. */
  readonly timeoutMs?: number | undefined;
}

// =============================================================================
// Controller
// =============================================================================

export class SubmissionGateController {
  private readonly reader: CellReader;
  private readonly reconciler: IcReconciler;
  private readonly ruleSet: ValidationRuleSet;
  private readonly aggregator: GateAggregator;
  private readonly flags: WorkflowFlagsAdapter;
  private readonly timeoutMs: number | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(config: SubmissionGateControllerConfig) {
    this.reader = config.reader;
    this.reconciler = config.reconciler;
    this.ruleSet = config.ruleSet ?? new ValidationRuleSet(config.reader);
    this.aggregator = config.aggregator ?? new GateAggregator();
    this.clock = config.clock ?? (() => new Date());
    this.flags = new WorkflowFlagsAdapter(config.config, this.clock);
    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  /**
   * Evaluate a transition attempt.
   *
   * @throws {SubmissionError} INVALID_CONTEXT or INVALID_POV for malformed input
   */
  async evaluate(input: SubmissionContext, options: EvaluateOptions = {}): Promise<SubmissionEvaluation> {
    const context = validateContext(input);
    const { pov } = context;
    const started = this.clock();
    const startedAt = started.toISOString();

    const ruleSlots = new Array<ValidationResult | undefined>(this.ruleSet.rules.length).fill(undefined);
    const gateSlots = new Array<GateCheckResult | undefined>(this.aggregator.gates.length).fill(undefined);
    const settled: { ic?: IcMatchReport | undefined; flagsReadAt?: string | undefined } = {};

    const work = Promise.all([
      this.ruleSet.evaluate(pov, (i, result) => {
        ruleSlots[i] = result;
      }),
      this.reconciler.reconcile(pov).then((report) => {
        settled.ic = report;
      }),
      this.flags.load(pov, COMMENTARY_ACCOUNTS).then((flags) => {
        settled.flagsReadAt = flags.readAt;
        return this.aggregator.evaluate(
          { pov, transitionKind: context.transitionKind, flags, reader: this.reader },
          (i, result) => {
            gateSlots[i] = result;
          },
        );
      }),
    ]);

    const abortReason = await this.waitFor(work, options);

    // Snapshot now: stages still running after an abort must not alter the record.
    const validationResults = ruleSlots.filter(isDefined);
    const gateResults = [settled.ic?.gateResult, ...gateSlots].filter(isDefined);
    const { flagsReadAt } = settled;
    const icEvents = settled.ic === undefined ? [] : icDiagnostics(settled.ic);

    const outcome: EvaluationOutcome =
      abortReason === undefined
        ? decide(validationResults, gateResults)
        : { kind: "aborted", reason: abortReason };

    if (abortReason !== undefined) {
      this.logger.warn(
        { pov, reason: abortReason, settledRules: validationResults.length, settledGates: gateResults.length },
        "Submission evaluation aborted",
      );
    }

    const digest = computeEvaluationDigest({ context, validationResults, gateResults, outcome });
    const durationMs = this.clock().getTime() - started.getTime();

    const events: EvaluationEvent[] = [
      { type: "evaluation-started", context, at: startedAt },
      ...(flagsReadAt !== undefined ? [{ type: "flags-read" as const, readAt: flagsReadAt }] : []),
      ...validationResults.map((result) => ({ type: "validation-result" as const, result })),
      ...icEvents,
      ...gateResults.map((result) => ({ type: "gate-result" as const, result })),
      { type: "evaluation-decided", outcome, digest, durationMs },
    ];

    return {
      context,
      outcome,
      validationResults,
      gateResults,
      flagsReadAt,
      startedAt,
      durationMs,
      digest,
      events,
    };
  }

  /**
   * Resolve when the work finishes (undefined) or when the evaluation is
   * cancelled (the abort reason). Rejections of the work propagate.
   */
  private async waitFor(work: Promise<unknown>, options: EvaluateOptions): Promise<string | undefined> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    if (signal?.aborted) {
      this.observeLateFailure(work);
      return describeAbort(signal.reason);
    }
    if (signal === undefined && timeoutMs === undefined) {
      await work;
      return undefined;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const cancelled = new Promise<string>((resolve) => {
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => resolve(`Evaluation timed out after ${timeoutMs} ms`), timeoutMs);
      }
      if (signal !== undefined) {
        onAbort = () => resolve(describeAbort(signal.reason));
        signal.addEventListener("abort", onAbort, { once: true });
      }
    });

    try {
      const winner = await Promise.race([work.then(() => undefined), cancelled]);
      if (winner !== undefined) {
        this.observeLateFailure(work);
      }
      return winner;
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      if (signal !== undefined && onAbort !== undefined) {
        signal.removeEventListener("abort", onAbort);
      }
    }
  }

  /** Stages abandoned by an abort may still fail; keep that visible. */
  private observeLateFailure(work: Promise<unknown>): void {
    void work.catch((cause: unknown) => {
      this.logger.error({ err: cause }, "Abandoned evaluation stage failed");
    });
  }
}

// =============================================================================
// Input validation
// =============================================================================

function isNonBlank(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

/** What IC matching could not check: a fallen-back partner list, then each skipped pair. */
export function icDiagnostics(report: IcMatchReport): IcDiagnosticEvent[] {
  const events: IcDiagnosticEvent[] = [];
  if (report.partnerConfigError !== undefined) {
    events.push({ type: "ic-partners-fallback", error: report.partnerConfigError });
  }
  for (const check of report.checks) {
    if (check.status === "unreadable" && check.error !== undefined) {
      events.push({
        type: "ic-pair-unreadable",
        partnerEntity: check.partnerEntity,
        pairType: check.pairType,
        error: check.error,
      });
    }
  }
  return events;
}

function describeAbort(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (reason === undefined) return "Evaluation cancelled";
  return String(reason);
}

/**
 * Reject input the engine cannot evaluate. These are programmatic errors,
 * distinct from any business rejection.
 */
export function validateContext(input: SubmissionContext): SubmissionContext {
  if (!isNonBlank(input.user)) {
    throw new SubmissionError("INVALID_CONTEXT", "Submission context requires a user");
  }
  if (!isTransitionKind(input.transitionKind)) {
    throw new SubmissionError(
      "INVALID_CONTEXT",
      `Unknown transition kind: ${String(input.transitionKind)}`,
    );
  }
  const candidate: unknown = input.pov;
  if (!isPov(candidate)) {
    throw new SubmissionError("INVALID_POV", "POV requires scenario, period and entity", {
      pov: candidate,
    });
  }

  return {
    user: input.user,
    pov: createPov(candidate),
    transitionKind: input.transitionKind,
    ...(input.sessionId !== undefined ? { sessionId: input.sessionId } : {}),
  };
}
