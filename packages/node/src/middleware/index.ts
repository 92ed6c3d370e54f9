/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, serializeDetails, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  callerMiddleware,
  requireCaller,
  API_KEY_HEADER,
  CALLER_ADDRESS_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
