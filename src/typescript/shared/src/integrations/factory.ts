import createClient from 'openapi-fetch';
import type { Logger } from 'winston';
import { errorLoggingMiddleware, withTimeout } from '../infrastructure/http';
import type { TokenProvider } from '../infrastructure/oauth';

export interface AuthenticatedClientOptions {
  logger: Logger;
  /** Log context for HTTP errors, e.g. 'strava-client'. */
  component: string;
  /** Deadline for each request; an abort surfaces as TimeoutError. */
  timeoutMs: number;
  fetch?: typeof fetch;
}

/**
 * Typed REST client that authenticates every request as the given tenant.
 *
 * The bearer token comes from the token provider, which refreshes it when it is
 * about to expire. A 401 is returned to the caller as-is: requests are not retried.
 */
export function createAuthenticatedClient<Paths extends object>(
  baseUrl: string,
  tokens: TokenProvider,
  tenantId: number,
  options: AuthenticatedClientOptions
) {
  const fetchFn = options.fetch ?? fetch;

  const authFetch = async (request: Request): Promise<Response> => {
    const token = await tokens.getValidToken(tenantId);

    const headers = new Headers(request.headers);
    headers.set('Authorization', `Bearer ${token}`);

    return withTimeout(options.timeoutMs, `${request.method} ${new URL(request.url).pathname}`, (signal) =>
      fetchFn(new Request(request, { headers, signal }))
    );
  };

  const client = createClient<Paths>({
    baseUrl,
    fetch: authFetch,
  });
  client.use(errorLoggingMiddleware(options.logger, options.component));
  return client;
}
