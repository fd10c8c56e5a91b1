/**
 * @closegate/audit: Append-only audit trail.
 */

export { AUDIT_CATEGORIES, isAuditCategory } from "./types.js";
export type {
  AuditCategory,
  AuditContext,
  AuditFields,
  ParsedLogEntry,
  LogSink,
} from "./types.js";

export {
  sanitizeForLog,
  FIELD_SEPARATOR,
  SEPARATOR_REPLACEMENT,
  MAX_FIELD_LENGTH,
} from "./sanitize.js";

export { LOG_PREFIX, buildLogEntry, parseLogEntry, formatAuditTimestamp } from "./entry.js";

export { captureAuditContext } from "./context.js";
export type { CaptureOptions } from "./context.js";

export { InMemoryLogSink, PinoLogSink, FileLogSink, CompositeLogSink } from "./sinks.js";
export type { AuditQuery } from "./sinks.js";

export { AuditLogger } from "./audit-logger.js";
export type {
  AuditFallback,
  AuditLoggerOptions,
  DataChangeEvent,
  WorkflowActionEvent,
  SystemEvent,
  SystemEventType,
  GateDecisionEvent,
  NotificationAuditEvent,
} from "./audit-logger.js";
