/**
 * Typed Hono context for the close gate API.
 */

import type { CloseGateService } from "../services/close-gate-service.js";

export interface AppEnv {
  Variables: {
    /** From the caller's X-Request-Id or freshly generated. */
    requestId: string;
    /** Set on every /api/* request; routes never build domain objects. */
    service: CloseGateService;
  };
}
