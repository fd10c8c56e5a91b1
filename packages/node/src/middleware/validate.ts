/**
 * Zod request parsing.
 *
 * Route handlers call these with the schema of their DTO and get the typed
 * value back. A body that is not JSON or does not match the schema throws
 * RequestValidationError, which the error handler renders as 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { RequestValidationError } from "../types/error.js";

export async function parseJsonBody<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError("Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError("Invalid query parameters", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
