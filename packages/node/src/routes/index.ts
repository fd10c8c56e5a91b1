/**
 * Route barrel - re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createSubmissionRoutes } from "./submissions.js";
export { createCheckRoutes } from "./checks.js";
export { createWorkflowRoutes } from "./workflow.js";
export { createAuditRoutes } from "./audit.js";
