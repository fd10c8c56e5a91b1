/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes to HTTP status codes. Anything else is a
 * 500 whose message is not exposed.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 500 | 503;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request parsing
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,

  // Submission gate
  INVALID_CONTEXT: 400,
  INVALID_POV: 400,
  EVALUATION_ABORTED: 503,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorDetails(err: Error): Record<string, unknown> | undefined {
  if (!("details" in err)) return undefined;
  const { details } = err;
  if (typeof details !== "object" || details === null || Array.isArray(details)) {
    return undefined;
  }
  return { ...details };
}

// =============================================================================
// Handler
// =============================================================================

export type InternalErrorLog = (err: Error, requestId: string | undefined) => void;

/**
 * Build the handler registered as Hono's onError.
 */
export function createErrorHandler(onInternalError?: InternalErrorLog) {
  return (err: Error, c: Context<AppEnv>): Response => {
    const code = errorCode(err);
    const status = code !== undefined ? STATUS_MAP[code] : undefined;

    if (code === undefined || status === undefined) {
      onInternalError?.(err, c.get("requestId"));
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message, errorDetails(err)), status);
  };
}
