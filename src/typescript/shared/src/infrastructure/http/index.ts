/**
 * Barrel export for HTTP infrastructure utilities.
 */
export { parseErrorResponse, errorLoggingMiddleware, withTimeout, truncate, MAX_ERROR_BODY_SIZE } from './errors';
