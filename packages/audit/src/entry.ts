/**
 * Entry format.
 *
 *   AUDIT_TRAIL|{CATEGORY}|Timestamp=yyyy-MM-dd HH:mm:ss.fff|User=..|Session=..
 *     |Machine=..|Scenario=..|Period=..|Entity=..|{Key=Value}...
 *
 * Every value is sanitized, so a `|` only ever separates fields and an entry
 * is always a single line.
 */

import { FIELD_SEPARATOR, sanitizeForLog } from "./sanitize.js";
import { isAuditCategory } from "./types.js";
import type { AuditCategory, AuditContext, AuditFields, ParsedLogEntry } from "./types.js";

export const LOG_PREFIX = "AUDIT_TRAIL";

const HEADER_KEYS = ["Timestamp", "User", "Session", "Machine", "Scenario", "Period", "Entity"] as const;

/** UTC, millisecond precision: `2024-02-05 09:30:00.000`. */
export function formatAuditTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 23);
}

export function buildLogEntry(
  category: AuditCategory,
  context: AuditContext,
  fields: AuditFields = [],
): string {
  const header: readonly string[] = [
    formatAuditTimestamp(context.timestampUtc),
    context.user,
    context.sessionId,
    context.machine,
    context.scenario,
    context.period,
    context.entity,
  ];

  const parts = [
    LOG_PREFIX,
    category,
    ...HEADER_KEYS.map((key, i) => `${key}=${sanitizeForLog(header[i])}`),
    ...fields.map(([key, value]) => `${key}=${sanitizeForLog(value)}`),
  ];
  return parts.join(FIELD_SEPARATOR);
}

/**
 * Parse an entry produced by buildLogEntry.
 *
 * Returns null for anything that is not an audit entry.
 */
export function parseLogEntry(line: string): ParsedLogEntry | null {
  const [prefix, category, ...pairs] = line.trimEnd().split(FIELD_SEPARATOR);
  if (prefix !== LOG_PREFIX || category === undefined || !isAuditCategory(category)) {
    return null;
  }

  const values = new Map<string, string>();
  const fields: Record<string, string> = {};
  pairs.forEach((pair, i) => {
    const eq = pair.indexOf("=");
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? "" : pair.slice(eq + 1);
    if (i < HEADER_KEYS.length) {
      values.set(key, value);
    } else {
      fields[key] = value;
    }
  });

  const timestamp = values.get("Timestamp");
  if (timestamp === undefined) {
    return null;
  }

  return {
    category,
    timestamp,
    user: values.get("User") ?? "",
    sessionId: values.get("Session") ?? "",
    machine: values.get("Machine") ?? "",
    scenario: values.get("Scenario") ?? "",
    period: values.get("Period") ?? "",
    entity: values.get("Entity") ?? "",
    fields,
    raw: line,
  };
}
