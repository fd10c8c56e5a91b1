/**
 * Error raised by a failed read of an external collaborator.
 *
 * Never fatal: rules and gates return it inside a Result and the caller
 * applies the documented degrade policy.
 */

import type { Pov } from "./pov.js";

export type DataFetchErrorCode =
  | "READ_FAILED"
  | "STORE_UNAVAILABLE";

export class DataFetchError extends Error {
  constructor(
    public readonly code: DataFetchErrorCode,
    message: string,
    public readonly pov?: Pov | undefined,
  ) {
    super(message);
    this.name = "DataFetchError";
  }

  /** Wrap whatever a collaborator threw. */
  static from(cause: unknown, pov?: Pov): DataFetchError {
    if (cause instanceof DataFetchError) {
      return cause;
    }
    const message = cause instanceof Error ? cause.message : String(cause);
    return new DataFetchError("READ_FAILED", message, pov);
  }
}
