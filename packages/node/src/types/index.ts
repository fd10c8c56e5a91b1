/**
 * Type barrel: re-exports all public types from @closegate/node.
 */

// DTOs
export {
  PovSchema,
  OperationSchema,
  EvaluateSubmissionSchema,
  WorkflowActionSchema,
  NotificationSchema,
  AuditEventSchema,
  AuditQuerySchema,
} from "./dto.js";
export type {
  OperationDto,
  EvaluateSubmissionDto,
  WorkflowActionDto,
  NotificationDto,
  AuditEventDto,
  AuditQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
