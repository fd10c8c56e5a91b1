/**
 * Workflow action and notification routes.
 *
 * POST /api/v1/workflow-actions  - Audit an action and raise its notification
 * POST /api/v1/notifications     - Raise a notification (202, fire-and-forget)
 */

import { Hono } from "hono";
import { createPov } from "@closegate/types";
import type { AppEnv } from "../types/api-contract.js";
import { NotificationSchema, WorkflowActionSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export function createWorkflowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/workflow-actions", async (c) => {
    const body = await parseJsonBody(c, WorkflowActionSchema);

    const notification = c.get("service").recordWorkflowAction({ ...body, pov: createPov(body.pov) });

    return c.json({ data: { recorded: true, notification: notification ?? null } }, 201);
  });

  routes.post("/notifications", async (c) => {
    const body = await parseJsonBody(c, NotificationSchema);

    c.get("service").notify(
      {
        kind: body.kind,
        pov: createPov(body.pov),
        actor: body.actor,
        extraFields: body.extraFields,
      },
      body.sessionId,
    );

    return c.json({ data: { accepted: true } }, 202);
  });

  return routes;
}
