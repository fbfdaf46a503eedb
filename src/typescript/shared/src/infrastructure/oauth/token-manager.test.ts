import { AuthError, UpstreamError } from '../../errors';
import { InMemoryCredentialStore } from '../../testing/in-memory-stores';
import { TokenLifecycleManager } from './token-manager';

describe('TokenLifecycleManager', () => {
  const now = new Date('2024-03-01T12:00:00Z');
  const logger: any = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
  logger.child = jest.fn(() => logger);

  let credentials: InMemoryCredentialStore;
  let oauth: { refresh: jest.Mock; exchangeCode: jest.Mock };
  let manager: TokenLifecycleManager;

  const seed = (expiresAt: Date) =>
    credentials.upsert({ tenantId: 42, accessToken: 'old-access', refreshToken: 'old-refresh', expiresAt, scope: 'read' });

  beforeEach(() => {
    credentials = new InMemoryCredentialStore();
    oauth = { refresh: jest.fn(), exchangeCode: jest.fn() };
    manager = new TokenLifecycleManager(credentials, oauth, logger, { refreshWindowSeconds: 60, now: () => now });
  });

  it('returns the stored token while it is outside the refresh window', async () => {
    await seed(new Date(now.getTime() + 61_000));

    expect(await manager.getValidToken(42)).toBe('old-access');
    expect(oauth.refresh).not.toHaveBeenCalled();
  });

  it('refreshes a token that expires within the window and rotates every field', async () => {
    await seed(new Date(now.getTime() + 30_000));
    const expiresAt = new Date('2024-03-01T18:00:00Z');
    oauth.refresh.mockResolvedValue({ accessToken: 'new-access', refreshToken: 'new-refresh', expiresAt });

    expect(await manager.getValidToken(42)).toBe('new-access');
    expect(oauth.refresh).toHaveBeenCalledWith('old-refresh');
    expect(await credentials.get(42)).toEqual({
      tenantId: 42, accessToken: 'new-access', refreshToken: 'new-refresh', expiresAt, scope: 'read',
    });
  });

  it('performs exactly one refresh for concurrent callers of the same tenant', async () => {
    await seed(new Date(now.getTime() - 1000));
    let release: () => void = () => undefined;
    oauth.refresh.mockImplementation(
      () => new Promise((resolve) => {
        release = () => resolve({ accessToken: 'new-access', refreshToken: 'new-refresh', expiresAt: new Date('2024-03-01T18:00:00Z') });
      })
    );

    const callers = Promise.all([manager.getValidToken(42), manager.getValidToken(42), manager.getValidToken(42)]);
    await new Promise((resolve) => setImmediate(resolve));
    release();

    expect(await callers).toEqual(['new-access', 'new-access', 'new-access']);
    expect(oauth.refresh).toHaveBeenCalledTimes(1);
  });

  it('returns the stored token when another process wins the rotation', async () => {
    const expired = new Date(now.getTime() - 1000);
    await seed(expired);
    oauth.refresh.mockImplementation(async () => {
      // A second process rotates while this refresh is in flight
      await credentials.rotate(42, expired, {
        accessToken: 'winner-access', refreshToken: 'winner-refresh', expiresAt: new Date('2024-03-01T19:00:00Z'),
      });
      return { accessToken: 'loser-access', refreshToken: 'loser-refresh', expiresAt: new Date('2024-03-01T18:00:00Z') };
    });

    expect(await manager.getValidToken(42)).toBe('winner-access');
    expect((await credentials.get(42))?.refreshToken).toBe('winner-refresh');
  });

  it('raises AuthError when the tenant has no credential', async () => {
    await expect(manager.getValidToken(7)).rejects.toBeInstanceOf(AuthError);
  });

  it('propagates refresh failures without retrying and clears the in-flight entry', async () => {
    await seed(new Date(now.getTime() - 1000));
    oauth.refresh.mockRejectedValueOnce(new UpstreamError(503, 'Service Unavailable (503)'));
    oauth.refresh.mockResolvedValueOnce({
      accessToken: 'new-access', refreshToken: 'new-refresh', expiresAt: new Date('2024-03-01T18:00:00Z'),
    });

    await expect(manager.getValidToken(42)).rejects.toBeInstanceOf(UpstreamError);
    expect(oauth.refresh).toHaveBeenCalledTimes(1);
    expect((await credentials.get(42))?.accessToken).toBe('old-access');

    expect(await manager.getValidToken(42)).toBe('new-access');
  });

  it('stores and revokes credentials', async () => {
    await manager.store({ tenantId: 9, accessToken: 'a', refreshToken: 'r', expiresAt: now, scope: null });
    expect(await credentials.get(9)).not.toBeNull();

    expect(await manager.revoke(9)).toBe(true);
    expect(await manager.revoke(9)).toBe(false);
  });
});
