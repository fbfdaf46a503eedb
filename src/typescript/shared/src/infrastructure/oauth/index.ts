export { generateOAuthState, validateOAuthState } from './state';
export { StravaOAuthClient } from './strava-oauth-client';
export type { OAuthTokenClient, TokenGrant } from './strava-oauth-client';
export { TokenLifecycleManager } from './token-manager';
export type { TokenProvider, TokenManagerOptions } from './token-manager';
