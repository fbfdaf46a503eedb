import { Pool } from 'pg';
import { PostgresCredentialStore } from './credential-store';

describe('PostgresCredentialStore', () => {
  const query = jest.fn();
  const store = new PostgresCredentialStore({ query } as unknown as Pool);
  const expiresAt = new Date('2024-03-01T12:00:00Z');

  beforeEach(() => {
    query.mockReset();
  });

  it('returns null for an unknown tenant', async () => {
    query.mockResolvedValue({ rows: [] });

    expect(await store.get(42)).toBeNull();
  });

  it('maps the stored row', async () => {
    query.mockResolvedValue({
      rows: [{ tenant_id: '42', access_token: 'access', refresh_token: 'refresh', expires_at: expiresAt, scope: 'read' }],
    });

    expect(await store.get(42)).toEqual({
      tenantId: 42,
      accessToken: 'access',
      refreshToken: 'refresh',
      expiresAt,
      scope: 'read',
    });
  });

  it('rotates only when the previous expiry still matches', async () => {
    const next = { accessToken: 'a2', refreshToken: 'r2', expiresAt: new Date('2024-03-01T18:00:00Z') };
    query.mockResolvedValueOnce({ rowCount: 1 }).mockResolvedValueOnce({ rowCount: 0 });

    expect(await store.rotate(42, expiresAt, next)).toBe(true);
    expect(await store.rotate(42, expiresAt, next)).toBe(false);
    expect(query.mock.calls[0][0]).toContain('WHERE tenant_id = $1 AND expires_at = $2');
    expect(query.mock.calls[0][1]).toEqual([42, expiresAt, 'a2', 'r2', next.expiresAt]);
  });

  it('reports whether a credential was deleted', async () => {
    query.mockResolvedValue({ rowCount: 1 });

    expect(await store.delete(42)).toBe(true);
    expect(query).toHaveBeenCalledWith('DELETE FROM tenant_credentials WHERE tenant_id = $1', [42]);
  });
});
