import { z } from 'zod';
import type { Logger } from 'winston';
import type { StravaConfig } from '../../config';
import { AuthError, UpstreamError } from '../../errors';
import { MAX_ERROR_BODY_SIZE, parseErrorResponse, truncate, withTimeout } from '../http';
import type { SecretsHelper } from '../secrets';

export interface TokenGrant {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  /** Provider account id, returned by the authorization-code exchange. */
  athleteId?: number;
}

export interface OAuthTokenClient {
  refresh(refreshToken: string): Promise<TokenGrant>;
  exchangeCode(code: string): Promise<TokenGrant>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.number().optional(),
  expires_in: z.number().optional(),
  athlete: z.object({ id: z.number() }).passthrough().optional(),
});

/** Status codes on which the provider refused the grant itself. */
const REJECTED_GRANT = new Set([400, 401, 403]);

/**
 * Form-encoded calls to the provider's token endpoint. Requests are bounded by
 * the configured timeout and never retried.
 */
export class StravaOAuthClient implements OAuthTokenClient {
  constructor(
    private config: StravaConfig,
    private secrets: SecretsHelper,
    private logger: Logger,
    private fetchFn: typeof fetch = fetch
  ) { }

  async refresh(refreshToken: string): Promise<TokenGrant> {
    return this.requestToken('refresh', {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
  }

  async exchangeCode(code: string): Promise<TokenGrant> {
    return this.requestToken('code exchange', {
      grant_type: 'authorization_code',
      code,
    });
  }

  private async requestToken(operation: string, params: Record<string, string>): Promise<TokenGrant> {
    const body = new URLSearchParams({
      client_id: this.secrets.get('STRAVA_CLIENT_ID'),
      client_secret: this.secrets.get('STRAVA_CLIENT_SECRET'),
      ...params,
    });

    // The deadline covers reading the body as well as the headers
    const { response, text } = await withTimeout(this.config.requestTimeoutMs, `Token ${operation}`, async (signal) => {
      const response = await this.fetchFn(this.config.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
        signal,
      });
      return { response, text: await response.text() };
    });

    const error = await parseErrorResponse(response, text);
    if (error) {
      this.logger.warn(`Token ${operation} failed`, { component: 'strava-oauth', status: error.status, body: error.body });
      if (REJECTED_GRANT.has(error.status)) {
        throw new AuthError(`Token ${operation} rejected by provider (${error.status}); the tenant must re-authorize`, {
          status: error.status,
        });
      }
      throw error;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new UpstreamError(
        response.status,
        `Malformed token ${operation} response`,
        truncate(text, MAX_ERROR_BODY_SIZE),
        this.config.tokenUrl
      );
    }
    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError(response.status, `Malformed token ${operation} response`, parsed.error.message, this.config.tokenUrl);
    }

    const data = parsed.data;
    // Prefer the absolute expiry; fall back to the relative one
    const expiresAt = data.expires_at !== undefined
      ? new Date(data.expires_at * 1000)
      : new Date(Date.now() + (data.expires_in ?? 0) * 1000);

    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token,
      expiresAt,
      athleteId: data.athlete?.id,
    };
  }
}
