
/**
 * HTTP Error utilities for the outbound REST clients (Strava, Discord).
 *
 * Provides:
 * - UpstreamHttpError class with status code and response body
 * - parseErrorResponse helper for explicit error handling
 * - wrapFetchWithErrorLogging for structured logging of failed calls
 */

import type { Logger } from 'winston';

/** Maximum size of error body to include in error messages */
export const MAX_ERROR_BODY_SIZE = 500;

/**
 * Truncate a string to maxLen, adding "..." if truncated.
 */
export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.substring(0, maxLen) + '...';
}

/**
 * A non-2xx response from an upstream API.
 */
export class UpstreamHttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly body: string;
  public readonly url?: string;

  constructor(status: number, statusText: string, body: string, url?: string) {
    const truncatedBody = truncate(body, MAX_ERROR_BODY_SIZE);
    const message = truncatedBody
      ? `${statusText} (${status}): ${truncatedBody}`
      : `${statusText} (${status})`;

    super(message);
    Object.setPrototypeOf(this, UpstreamHttpError.prototype);
    this.name = 'UpstreamHttpError';
    this.status = status;
    this.statusText = statusText;
    this.body = truncatedBody;
    this.url = url;
  }
}

/**
 * Parse a fetch Response and return an UpstreamHttpError if it's an error response.
 * Returns null for success responses.
 *
 * @param body - Optional pre-read body; read from the response otherwise
 */
export async function parseErrorResponse(response: Response, body?: string): Promise<UpstreamHttpError | null> {
  if (response.ok) return null;

  const errorBody = body ?? await response.text();
  return new UpstreamHttpError(
    response.status,
    response.statusText || 'Error',
    errorBody,
    response.url
  );
}

/**
 * Wrap a fetch function so failed responses are logged before the caller sees them.
 *
 * @param provider - Provider name for context (e.g., 'strava')
 */
export function wrapFetchWithErrorLogging(
  fetchFn: typeof fetch,
  logger: Pick<Logger, 'error'>,
  provider: string
): typeof fetch {
  return async (input, init) => {
    const response = await fetchFn(input, init);

    if (!response.ok) {
      const body = await response.clone().text();

      logger.error(`[${provider}] HTTP ${response.status}`, {
        component: `${provider}-client`,
        method: init?.method || 'GET',
        status: response.status,
        statusText: response.statusText,
        body: truncate(body, MAX_ERROR_BODY_SIZE)
      });
    }

    return response;
  };
}
