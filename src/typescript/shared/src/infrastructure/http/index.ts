/**
 * Barrel export for HTTP infrastructure utilities.
 */
export { UpstreamHttpError, parseErrorResponse, wrapFetchWithErrorLogging, truncate, MAX_ERROR_BODY_SIZE } from './errors';
