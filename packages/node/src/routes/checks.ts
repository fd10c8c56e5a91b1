/**
 * Separately-triggered check runs.
 *
 * POST /api/v1/data-quality/run       - Validation rules; records the data-quality flag
 * POST /api/v1/ic-matching/run        - IC matching; alerts both controllers per partner
 * POST /api/v1/budget-variance/scan   - Budget variance alerts; flags management review
 */

import { Hono } from "hono";
import { createPov } from "@closegate/types";
import type { AppEnv } from "../types/api-contract.js";
import { OperationSchema } from "../types/dto.js";
import type { OperationDto } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";
import type { OperationInput } from "../services/close-gate-service.js";
import { presentBudgetScan, presentIcReport } from "./presenters.js";

function toOperation(body: OperationDto): OperationInput {
  return { pov: createPov(body.pov), user: body.user, sessionId: body.sessionId };
}

export function createCheckRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/data-quality/run", async (c) => {
    const body = await parseJsonBody(c, OperationSchema);
    const run = await c.get("service").runDataQualityChecks(toOperation(body));
    return c.json({ data: run });
  });

  routes.post("/ic-matching/run", async (c) => {
    const body = await parseJsonBody(c, OperationSchema);
    const report = await c.get("service").runIcMatching(toOperation(body));
    return c.json({ data: presentIcReport(report) });
  });

  routes.post("/budget-variance/scan", async (c) => {
    const body = await parseJsonBody(c, OperationSchema);
    const scan = await c.get("service").scanBudgetVariances(toOperation(body));
    return c.json({ data: presentBudgetScan(scan) });
  });

  return routes;
}
