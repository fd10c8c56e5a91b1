/**
 * @closegate/node: HTTP surface and service composition.
 */

export { CloseGateService } from "./services/close-gate-service.js";
export type {
  CloseGateServiceConfig,
  OperationInput,
  DataQualityRun,
  BudgetScan,
  WorkflowActionInput,
  AuditEventInput,
} from "./services/close-gate-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
