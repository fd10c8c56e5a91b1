/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Kept apart from main.ts
 * so tests can drive the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { CloseGateService } from "./services/close-gate-service.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler, requestIdMiddleware, requestLogger } from "./middleware/index.js";
import type { InternalErrorLog } from "./middleware/index.js";
import {
  createAuditRoutes,
  createCheckRoutes,
  createHealthRoutes,
  createSubmissionRoutes,
  createWorkflowRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: CloseGateService;
  /** Request logging is off when omitted. */
  readonly logger?: Logger | undefined;
  readonly onInternalError?: InternalErrorLog | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CloseGateService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", requestLogger(options.logger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404));

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/submissions", createSubmissionRoutes());
  app.route("/api/v1", createCheckRoutes());
  app.route("/api/v1", createWorkflowRoutes());
  app.route("/api/v1/audit", createAuditRoutes());

  return { app, service };
}
