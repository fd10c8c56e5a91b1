/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const name = z.string().trim().min(1).max(128);

export const PovSchema = z.object({
  scenario: name,
  period: name,
  entity: name,
  account: name.optional(),
  extraDimensions: z.record(z.string()).optional(),
});

/** Who is calling, for which POV. */
export const OperationSchema = z.object({
  pov: PovSchema,
  user: name,
  sessionId: z.string().min(1).max(128).optional(),
});

export type OperationDto = z.infer<typeof OperationSchema>;

// =============================================================================
// Submission
// =============================================================================

export const EvaluateSubmissionSchema = OperationSchema.extend({
  transitionKind: z.enum(["submit", "ic-reconciliation", "review", "certify"]),
  timeoutMs: z.number().int().min(1).max(300_000).optional(),
});

export type EvaluateSubmissionDto = z.infer<typeof EvaluateSubmissionSchema>;

// =============================================================================
// Workflow & notifications
// =============================================================================

export const WorkflowActionSchema = OperationSchema.extend({
  action: z.enum(["submit", "approve", "reject", "lock", "unlock"]),
  fromStatus: z.string().max(64),
  toStatus: z.string().max(64),
  comments: z.string().max(4000).optional(),
});

export type WorkflowActionDto = z.infer<typeof WorkflowActionSchema>;

export const NotificationSchema = z.object({
  kind: z.enum(["submission", "approval", "rejection", "data-quality", "ic-mismatch"]),
  pov: PovSchema,
  actor: name.optional(),
  sessionId: z.string().min(1).max(128).optional(),
  extraFields: z.record(z.string().max(4000)).optional(),
});

export type NotificationDto = z.infer<typeof NotificationSchema>;

// =============================================================================
// Audit
// =============================================================================

export const AuditEventSchema = OperationSchema.extend({
  event: z.discriminatedUnion("type", [
    z.object({
      type: z.literal("data-change"),
      account: name,
      oldValue: z.number().finite(),
      newValue: z.number().finite(),
    }),
    z.object({
      type: z.literal("system-event"),
      event: z.object({
        type: z.enum(["consolidation", "translation", "data-load"]),
        status: z.string().max(64).optional(),
        details: z.string().max(4000).optional(),
      }),
    }),
    z.object({
      type: z.literal("generic"),
      eventType: name,
      details: z.string().max(4000),
    }),
  ]),
});

export type AuditEventDto = z.infer<typeof AuditEventSchema>;

export const AuditQuerySchema = z.object({
  category: z
    .enum([
      "DATA_CHANGE",
      "WORKFLOW_ACTION",
      "SYSTEM_EVENT",
      "GENERIC_EVENT",
      "GATE_DECISION",
      "VALIDATION_RESULT",
      "GATE_RESULT",
      "IC_MISMATCH",
      "BUDGET_ALERT",
      "NOTIFICATION",
    ])
    .optional(),
  entity: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type AuditQueryDto = z.infer<typeof AuditQuerySchema>;
