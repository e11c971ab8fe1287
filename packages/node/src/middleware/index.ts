/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, handleNotFound, DOMAIN_STATUS } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody } from "./validate.js";
export {
  callerMiddleware,
  requireCaller,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./caller.js";
export type { CallerConfig } from "./caller.js";
