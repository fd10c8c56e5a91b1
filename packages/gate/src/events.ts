/**
 * Evaluation events.
 *
 * The controller decides; it does not log or notify. Everything a
 * downstream consumer (audit trail, notifications) needs is emitted as an
 * event list on the evaluation.
 */

import type {
  DataFetchError,
  GateCheckResult,
  IcPairType,
  SubmissionContext,
  ValidationResult,
} from "@closegate/types";
import type { EvaluationOutcome } from "./evaluation.js";

export type EvaluationEvent =
  | {
      readonly type: "evaluation-started";
      readonly context: SubmissionContext;
      readonly at: string;
    }
  | {
      readonly type: "flags-read";
      readonly readAt: string;
    }
  | {
      readonly type: "validation-result";
      readonly result: ValidationResult;
    }
  | {
      /** An IC pair skipped because one side could not be read. */
      readonly type: "ic-pair-unreadable";
      readonly partnerEntity: string;
      readonly pairType: IcPairType;
      readonly error: DataFetchError;
    }
  | {
      /** The configured partner list could not be read; the directory was used. */
      readonly type: "ic-partners-fallback";
      readonly error: DataFetchError;
    }
  | {
      readonly type: "gate-result";
      readonly result: GateCheckResult;
    }
  | {
      readonly type: "evaluation-decided";
      readonly outcome: EvaluationOutcome;
      readonly digest: string;
      readonly durationMs: number;
    };

export type EvaluationEventType = EvaluationEvent["type"];

/** IC checks that could not run; skipped rather than failed. */
export type IcDiagnosticEvent = Extract<
  EvaluationEvent,
  { readonly type: "ic-pair-unreadable" | "ic-partners-fallback" }
>;
