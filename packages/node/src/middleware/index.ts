/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, parseParam } from "./validate.js";
export { callerMiddleware, requireCaller, ACCOUNT_ID_HEADER } from "./caller.js";
