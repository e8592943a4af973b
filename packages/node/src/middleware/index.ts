/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler, handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery, readId } from "./validate.js";
export {
  authMiddleware,
  requirePermission,
  methodPermission,
  API_KEY_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
