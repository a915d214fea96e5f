/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery } from "./validate.js";
export {
  authMiddleware,
  userHeaderMiddleware,
  authConfigFromKeys,
  API_KEY_HEADER,
  USER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
