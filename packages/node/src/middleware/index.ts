/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { callerMiddleware, CALLER_HEADER } from "./caller.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
