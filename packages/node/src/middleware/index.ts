/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody, parseQuery } from "./validate.js";
export { accountMiddleware, ACCOUNT_HEADER } from "./account.js";
export { serviceMiddleware } from "./service.js";
