jest.mock('@sentry/node', () => ({
  init: jest.fn(),
  httpIntegration: jest.fn(() => ({ name: 'Http' })),
  nativeNodeFetchIntegration: jest.fn(() => ({ name: 'NodeFetch' })),
  onUncaughtExceptionIntegration: jest.fn(() => ({ name: 'OnUncaughtException' })),
  onUnhandledRejectionIntegration: jest.fn(() => ({ name: 'OnUnhandledRejection' })),
  contextLinesIntegration: jest.fn(() => ({ name: 'ContextLines' })),
}));

import * as Sentry from '@sentry/node';
import { initSentry } from './index';

describe('initSentry', () => {
  const logger: any = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('stays disabled without a DSN', () => {
    expect(initSentry({ environment: 'test' }, logger)).toBe(false);
    expect(Sentry.init).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('Sentry DSN not configured - error tracking disabled');
  });

  it('initializes on every call with a DSN', () => {
    const config = { dsn: 'https://public@sentry.example.com/1', environment: 'test' };

    expect(initSentry(config, logger)).toBe(true);
    expect(initSentry(config, logger)).toBe(true);
    expect(Sentry.init).toHaveBeenCalledTimes(2);
    expect((Sentry.init as jest.Mock).mock.calls[0][0]).toMatchObject({
      dsn: 'https://public@sentry.example.com/1',
      environment: 'test',
      tracesSampleRate: 0.1,
    });
  });

  it('reports disabled when the SDK fails to start', () => {
    (Sentry.init as jest.Mock).mockImplementationOnce(() => {
      throw new Error('bad dsn');
    });

    expect(initSentry({ dsn: 'https://public@sentry.example.com/1', environment: 'test' }, logger)).toBe(false);
    expect(logger.error).toHaveBeenCalledWith('Failed to initialize Sentry', { error: expect.any(Error) });
  });

  it('strips credentials from reported requests', () => {
    initSentry({ dsn: 'https://public@sentry.example.com/1', environment: 'test' }, logger);
    const { beforeSend } = (Sentry.init as jest.Mock).mock.calls[0][0];

    const event = beforeSend({
      request: { headers: { authorization: 'Bearer test-token', cookie: 'sid=1', accept: 'application/json' } },
    });

    expect(event.request.headers).toEqual({ accept: 'application/json' });
  });
});
