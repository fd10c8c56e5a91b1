/**
 * Health check route.
 *
 * GET /health - Liveness plus audit trail state. Reports `degraded` once any
 * audit entry has failed to reach one of the configured sinks.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CloseGateService } from "../services/close-gate-service.js";

export function createHealthRoutes(service: CloseGateService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const dropped = service.audit.dropped;
    return c.json({
      status: dropped > 0 ? "degraded" : "ok",
      timestamp: new Date().toISOString(),
      audit: {
        entries: service.auditTrail.size,
        dropped,
      },
    });
  });

  return routes;
}
