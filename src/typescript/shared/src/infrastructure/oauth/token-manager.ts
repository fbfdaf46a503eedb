import type { Logger } from 'winston';
import { AuthError } from '../../errors';
import type { CredentialStore } from '../../storage/types';
import type { TenantCredential } from '../../types';
import type { OAuthTokenClient } from './strava-oauth-client';

export interface TokenProvider {
  getValidToken(tenantId: number): Promise<string>;
}

export interface TokenManagerOptions {
  /** Refresh tokens that expire within this many seconds. */
  refreshWindowSeconds: number;
  now?: () => Date;
}

/**
 * Hands out access tokens and rotates them when they are about to expire.
 *
 * Refreshes are serialised per tenant twice over: concurrent callers in this
 * process share one in-flight refresh, and the stored rotation is a
 * compare-and-swap on the previous expiry, so a second process that loses the
 * race reads back the winner's token instead of writing its own.
 */
export class TokenLifecycleManager implements TokenProvider {
  private readonly inflight = new Map<number, Promise<string>>();
  private readonly now: () => Date;

  constructor(
    private credentials: CredentialStore,
    private oauth: OAuthTokenClient,
    private logger: Logger,
    private options: TokenManagerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async getValidToken(tenantId: number): Promise<string> {
    const credential = await this.requireCredential(tenantId);
    if (!this.needsRefresh(credential)) {
      return credential.accessToken;
    }
    return this.refreshOnce(tenantId);
  }

  /** Saves the credential obtained by the OAuth connect flow. */
  async store(credential: TenantCredential): Promise<void> {
    await this.credentials.upsert(credential);
    this.logger.info('Stored tenant credential', { component: 'token-manager', tenant_id: credential.tenantId });
  }

  /** Removes the tenant's credential after deauthorization. Returns false if there was none. */
  async revoke(tenantId: number): Promise<boolean> {
    const deleted = await this.credentials.delete(tenantId);
    this.logger.info('Revoked tenant credential', { component: 'token-manager', tenant_id: tenantId, deleted });
    return deleted;
  }

  private refreshOnce(tenantId: number): Promise<string> {
    const pending = this.inflight.get(tenantId);
    if (pending) return pending;

    const refresh = this.refresh(tenantId).finally(() => {
      this.inflight.delete(tenantId);
    });
    this.inflight.set(tenantId, refresh);
    return refresh;
  }

  private async refresh(tenantId: number): Promise<string> {
    const log = this.logger.child({ component: 'token-manager', tenant_id: tenantId });

    // Another process may have rotated since the caller's read
    const credential = await this.requireCredential(tenantId);
    if (!this.needsRefresh(credential)) {
      return credential.accessToken;
    }

    log.info('Refreshing access token', { expiresAt: credential.expiresAt.toISOString() });
    const grant = await this.oauth.refresh(credential.refreshToken);
    const rotated = await this.credentials.rotate(tenantId, credential.expiresAt, {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiresAt: grant.expiresAt,
    });

    if (rotated) {
      log.info('Access token rotated', { expiresAt: grant.expiresAt.toISOString() });
      return grant.accessToken;
    }

    log.info('Lost rotation race; using the stored token');
    const winner = await this.requireCredential(tenantId);
    return winner.accessToken;
  }

  private async requireCredential(tenantId: number): Promise<TenantCredential> {
    const credential = await this.credentials.get(tenantId);
    if (!credential) {
      throw new AuthError(`No credential stored for tenant ${tenantId}`, { tenantId });
    }
    return credential;
  }

  private needsRefresh(credential: TenantCredential): boolean {
    const remainingMs = credential.expiresAt.getTime() - this.now().getTime();
    return remainingMs < this.options.refreshWindowSeconds * 1000;
  }
}
