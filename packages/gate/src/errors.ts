/**
 * Programmatic failures of a submission evaluation.
 *
 * Business rejections are never thrown; they come back as a `reject`
 * decision. SubmissionError is reserved for inputs the engine cannot work
 * with and for evaluations that were cancelled before they could decide.
 */

export type SubmissionErrorCode =
  | "INVALID_CONTEXT"
  | "INVALID_POV"
  | "EVALUATION_ABORTED";

export class SubmissionError extends Error {
  constructor(
    public readonly code: SubmissionErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "SubmissionError";
  }
}
