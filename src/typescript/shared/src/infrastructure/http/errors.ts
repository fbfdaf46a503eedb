/**
 * HTTP error utilities for calls to the activity provider.
 *
 * Provides:
 * - parseErrorResponse helper turning a non-2xx Response into an UpstreamError
 * - errorLoggingMiddleware for openapi-fetch clients
 * - withTimeout, which maps an aborted request to a TimeoutError
 */

import type { Middleware } from 'openapi-fetch';
import type { Logger } from 'winston';
import { TimeoutError, UpstreamError } from '../../errors';

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
 * Parse a fetch Response and return an UpstreamError if it's an error response.
 * Returns null for success responses.
 *
 * @param body - Optional pre-read body (if not provided, will clone and read)
 */
export async function parseErrorResponse(response: Response, body?: string): Promise<UpstreamError | null> {
  if (response.ok) return null;

  const errorBody = truncate(body ?? await response.clone().text(), MAX_ERROR_BODY_SIZE);
  const statusText = response.statusText || 'Error';
  return new UpstreamError(
    response.status,
    errorBody ? `${statusText} (${response.status}): ${errorBody}` : `${statusText} (${response.status})`,
    errorBody,
    response.url || undefined
  );
}

/**
 * Middleware for openapi-fetch clients that logs HTTP error responses.
 *
 * @param component - Optional component name for log context (e.g., 'strava-client')
 */
export function errorLoggingMiddleware(logger: Logger, component?: string): Middleware {
  return {
    async onResponse({ response, request }) {
      if (!response.ok) {
        const body = await response.clone().text();

        logger.error('HTTP error response', {
          component: component || 'http-client',
          url: request.url,
          method: request.method,
          status: response.status,
          statusText: response.statusText,
          body: truncate(body, MAX_ERROR_BODY_SIZE)
        });
      }
      return response;
    }
  };
}

/**
 * Runs an outbound call under a deadline. The call receives the abort signal;
 * an abort is reported as a TimeoutError, anything else propagates unchanged.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  description: string,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const signal = AbortSignal.timeout(timeoutMs);
  try {
    return await call(signal);
  } catch (err) {
    if (signal.aborted || isAbortError(err)) {
      throw new TimeoutError(`${description} timed out after ${timeoutMs}ms`, timeoutMs);
    }
    throw err;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
