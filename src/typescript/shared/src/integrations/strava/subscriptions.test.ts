import { UpstreamError } from '../../errors';
import { StravaSubscriptions } from './subscriptions';

describe('StravaSubscriptions', () => {
  const config: any = { apiBaseUrl: 'https://provider.test/api/v3', requestTimeoutMs: 1000 };
  const credentials = { clientId: 'test-client', clientSecret: 'test-secret' };
  let fetchFn: jest.Mock;
  let subscriptions: StravaSubscriptions;

  const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

  beforeEach(() => {
    fetchFn = jest.fn();
    subscriptions = new StravaSubscriptions(config, credentials, fetchFn);
  });

  it('lists subscriptions with the app credentials in the query', async () => {
    fetchFn.mockResolvedValue(json([{ id: 99, callback_url: 'https://hooks.test/webhook', created_at: '2024-01-01T00:00:00Z' }]));

    const result = await subscriptions.list();

    expect(result).toEqual([{ id: 99, callbackUrl: 'https://hooks.test/webhook', createdAt: '2024-01-01T00:00:00Z' }]);
    const url: URL = fetchFn.mock.calls[0][0];
    expect(url.toString()).toBe(
      'https://provider.test/api/v3/push_subscriptions?client_id=test-client&client_secret=test-secret'
    );
  });

  it('creates a subscription with a form body', async () => {
    fetchFn.mockResolvedValue(json({ id: 100 }, 201));

    const id = await subscriptions.create('https://hooks.test/webhook', 'test-verify');

    expect(id).toBe(100);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url.toString()).toBe('https://provider.test/api/v3/push_subscriptions');
    expect(init.method).toBe('POST');
    expect(Object.fromEntries(init.body)).toEqual({
      client_id: 'test-client',
      client_secret: 'test-secret',
      callback_url: 'https://hooks.test/webhook',
      verify_token: 'test-verify',
    });
  });

  it('deletes a subscription by id', async () => {
    fetchFn.mockResolvedValue(new Response(null, { status: 204 }));

    await subscriptions.delete(99);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url.toString()).toBe(
      'https://provider.test/api/v3/push_subscriptions/99?client_id=test-client&client_secret=test-secret'
    );
    expect(init.method).toBe('DELETE');
  });

  it('surfaces a refused callback verification as UpstreamError', async () => {
    fetchFn.mockResolvedValue(json({ message: 'Bad Request', errors: [{ field: 'callback url', code: 'GET to callback URL does not return 200' }] }, 400));

    await expect(subscriptions.create('https://hooks.test/webhook', 'test-verify')).rejects.toBeInstanceOf(UpstreamError);
  });
});
