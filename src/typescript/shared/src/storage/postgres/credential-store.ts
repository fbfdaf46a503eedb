import { Pool } from 'pg';
import { withDatabaseErrors } from './errors';
import { TenantCredential, TokenRotation } from '../../types';
import { CredentialStore } from '../types';

interface CredentialRow {
  tenant_id: string;
  access_token: string;
  refresh_token: string;
  expires_at: Date;
  scope: string | null;
}

/**
 * PostgresCredentialStore holds exactly one credential per tenant.
 */
export class PostgresCredentialStore implements CredentialStore {
  constructor(private pool: Pool) { }

  async get(tenantId: number): Promise<TenantCredential | null> {
    const result = await withDatabaseErrors(() => this.pool.query<CredentialRow>(
      'SELECT tenant_id, access_token, refresh_token, expires_at, scope FROM tenant_credentials WHERE tenant_id = $1',
      [tenantId]
    ));
    if (result.rows.length === 0) return null;

    const row = result.rows[0];
    return {
      tenantId: Number(row.tenant_id),
      accessToken: row.access_token,
      refreshToken: row.refresh_token,
      expiresAt: row.expires_at,
      scope: row.scope,
    };
  }

  async upsert(credential: TenantCredential): Promise<void> {
    await withDatabaseErrors(() => this.pool.query(
      `INSERT INTO tenant_credentials (tenant_id, access_token, refresh_token, expires_at, scope)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (tenant_id) DO UPDATE SET
         access_token = EXCLUDED.access_token,
         refresh_token = EXCLUDED.refresh_token,
         expires_at = EXCLUDED.expires_at,
         scope = EXCLUDED.scope,
         updated_at = now()`,
      [credential.tenantId, credential.accessToken, credential.refreshToken, credential.expiresAt, credential.scope]
    ));
  }

  /**
   * Compare-and-swap on the previous expiry, so two processes refreshing the
   * same tenant cannot both win.
   */
  async rotate(tenantId: number, previousExpiresAt: Date, next: TokenRotation): Promise<boolean> {
    const result = await withDatabaseErrors(() => this.pool.query(
      `UPDATE tenant_credentials
          SET access_token = $3, refresh_token = $4, expires_at = $5, updated_at = now()
        WHERE tenant_id = $1 AND expires_at = $2`,
      [tenantId, previousExpiresAt, next.accessToken, next.refreshToken, next.expiresAt]
    ));
    return result.rowCount === 1;
  }

  async delete(tenantId: number): Promise<boolean> {
    const result = await withDatabaseErrors(() => this.pool.query('DELETE FROM tenant_credentials WHERE tenant_id = $1', [tenantId]));
    return Boolean(result.rowCount);
  }
}
