import {
  AuthError,
  createCloudFunction,
  FrameworkContext,
  FrameworkHandler,
  FrameworkResponse,
  generateOAuthState,
  routeRequest,
  RouteMatch,
  validateOAuthState,
} from '@trailquery/shared';

/** Scope presets the connect page offers; anything else falls back to the configured scope. */
const SCOPE_PRESETS: Record<string, string> = {
  read: 'read',
  read_all: 'read,activity:read_all',
};

function withReason(url: string, reason: string): string {
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}reason=${encodeURIComponent(reason)}`;
}

export function authorize(match: RouteMatch, ctx: FrameworkContext): FrameworkResponse {
  const { config, secrets } = ctx;
  if (!config.oauth.redirectUri) {
    throw new Error('OAUTH_REDIRECT_URI is not configured');
  }

  const requested = match.query.scope;
  const scope = requested && Object.hasOwn(SCOPE_PRESETS, requested) ? SCOPE_PRESETS[requested] : config.strava.scope;
  const state = generateOAuthState(secrets.get('OAUTH_STATE_SECRET'), config.oauth.stateTtlMs);

  const url = new URL(config.strava.authorizeUrl);
  url.searchParams.set('client_id', secrets.get('STRAVA_CLIENT_ID'));
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('redirect_uri', config.oauth.redirectUri);
  url.searchParams.set('approval_prompt', 'force');
  url.searchParams.set('scope', scope);
  url.searchParams.set('state', state);

  ctx.logger.info('Redirecting to provider authorization', { scope });
  return FrameworkResponse.redirect(url.toString());
}

export async function callback(match: RouteMatch, ctx: FrameworkContext): Promise<FrameworkResponse> {
  const { config, logger, secrets, services } = ctx;
  const failure = (reason: string) => FrameworkResponse.redirect(withReason(config.oauth.failureRedirectUrl, reason));

  // Extract query parameters
  const { code, state, scope, error } = match.query;

  // Handle authorization denial
  if (error) {
    logger.warn('User denied authorization', { error });
    return failure('denied');
  }

  if (!code || !state) {
    logger.error('Missing required OAuth parameters');
    return failure('missing_params');
  }

  // Validate state token (CSRF protection)
  if (!validateOAuthState(state, secrets.get('OAUTH_STATE_SECRET'))) {
    logger.error('Invalid or expired state token');
    return failure('invalid_state');
  }

  try {
    const grant = await services.oauth.exchangeCode(code);
    if (grant.athleteId === undefined) {
      logger.error('Token exchange response carried no athlete id');
      return failure('server_error');
    }

    // The provider account is the tenant
    await services.tokens.store({
      tenantId: grant.athleteId,
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiresAt: grant.expiresAt,
      scope: scope ?? null,
    });

    logger.info('Connected provider account', { tenant_id: grant.athleteId, scope });
    return FrameworkResponse.redirect(config.oauth.successRedirectUrl);
  } catch (err: unknown) {
    logger.error('Error processing OAuth callback', { error: err });
    return failure(err instanceof AuthError ? 'exchange_rejected' : 'server_error');
  }
}

export const handler: FrameworkHandler = async (req, _res, ctx) =>
  routeRequest(req, ctx, [
    { method: 'GET', pattern: '*oauth/authorize', handler: (match) => authorize(match, ctx) },
    { method: 'GET', pattern: '*oauth/callback', handler: (match) => callback(match, ctx) },
  ]);

export const stravaOAuthHandler = createCloudFunction(handler, {
  allowUnauthenticated: true, // Browser redirects to and from the provider
});
