/**
 * Middleware barrel.
 */

export { createErrorHandler } from "./error-handler.js";
export type { InternalErrorLog } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { requestLogger } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseJsonBody, parseQuery } from "./validate.js";
