/**
 * Submission gate route.
 *
 * POST /api/v1/submissions/evaluate - Decide whether a transition may proceed
 *
 * A business rejection is a 200 with `decision.kind = "reject"`; only
 * malformed input (400) and aborted evaluations (503) are errors.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EvaluateSubmissionSchema } from "../types/dto.js";
import { parseJsonBody } from "../middleware/validate.js";

export function createSubmissionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/evaluate", async (c) => {
    const service = c.get("service");
    const body = await parseJsonBody(c, EvaluateSubmissionSchema);

    const evaluation = await service.evaluate(
      {
        user: body.user,
        pov: body.pov,
        transitionKind: body.transitionKind,
        sessionId: body.sessionId,
      },
      { timeoutMs: body.timeoutMs },
    );

    return c.json({
      data: {
        decision: evaluation.outcome,
        digest: evaluation.digest,
        validationResults: evaluation.validationResults,
        gateResults: evaluation.gateResults,
        flagsReadAt: evaluation.flagsReadAt,
        startedAt: evaluation.startedAt,
        durationMs: evaluation.durationMs,
      },
    });
  });

  return routes;
}
