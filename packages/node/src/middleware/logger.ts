/**
 * Request logging middleware.
 *
 * One pino line per request once the response is ready. Server errors log
 * at `error`, client errors at `warn`, everything else at `info`.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
}

export function requestLogger(logger: Logger, now: () => number = Date.now): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = now();
    await next();

    const entry: RequestLogEntry = {
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - start,
    };
    const message = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) {
      logger.error(entry, message);
    } else if (entry.status >= 400) {
      logger.warn(entry, message);
    } else {
      logger.info(entry, message);
    }
  };
}
