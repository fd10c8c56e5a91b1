/**
 * Audit trail routes.
 *
 * GET  /api/v1/audit         - Query the in-memory trail (newest first)
 * POST /api/v1/audit/events  - Record a data change, system event or generic event
 */

import { Hono } from "hono";
import { createPov } from "@closegate/types";
import type { AppEnv } from "../types/api-contract.js";
import { AuditEventSchema, AuditQuerySchema } from "../types/dto.js";
import { parseJsonBody, parseQuery } from "../middleware/validate.js";

export function createAuditRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, AuditQuerySchema);
    const entries = c.get("service").queryAudit(query);
    return c.json({ data: entries, total: entries.length });
  });

  routes.post("/events", async (c) => {
    const body = await parseJsonBody(c, AuditEventSchema);

    c.get("service").recordAuditEvent(
      { pov: createPov(body.pov), user: body.user, sessionId: body.sessionId },
      body.event,
    );

    return c.json({ data: { recorded: true } }, 201);
  });

  return routes;
}
