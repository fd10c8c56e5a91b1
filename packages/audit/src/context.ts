/**
 * Audit context capture.
 */

import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import type { Pov } from "@closegate/types";
import type { AuditContext } from "./types.js";

export interface CaptureOptions {
  readonly clock?: (() => Date) | undefined;
  readonly machine?: (() => string) | undefined;
}

const UNKNOWN = "Unknown";

function machineName(resolve: () => string): string {
  try {
    const name = resolve();
    return name.length > 0 ? name : UNKNOWN;
  } catch {
    return UNKNOWN;
  }
}

/**
 * Capture who, where and when for one execution. Without a POV the
 * scenario, period and entity fields read `Unknown`.
 */
export function captureAuditContext(
  input: { readonly user: string; readonly pov?: Pov | undefined; readonly sessionId?: string | undefined },
  options: CaptureOptions = {},
): AuditContext {
  const clock = options.clock ?? (() => new Date());
  return {
    user: input.user,
    timestampUtc: clock(),
    sessionId: input.sessionId ?? randomUUID(),
    machine: machineName(options.machine ?? hostname),
    scenario: input.pov?.scenario ?? UNKNOWN,
    period: input.pov?.period ?? UNKNOWN,
    entity: input.pov?.entity ?? UNKNOWN,
  };
}
