/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, handleNotFound } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export { authMiddleware, requirePermission, assertActsFor } from "./auth.js";
export type { AuthConfig } from "./auth.js";
