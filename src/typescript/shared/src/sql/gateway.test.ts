import { TimeoutError } from '../errors';
import { DEFAULT_TENANT_TABLES } from './rewriter';
import { QueryGateway } from './gateway';

describe('QueryGateway', () => {
  const logger: any = { debug: jest.fn(), warn: jest.fn(), info: jest.fn(), error: jest.fn() };
  logger.child = jest.fn(() => logger);

  const execute = jest.fn();
  const gateway = new QueryGateway({ execute }, DEFAULT_TENANT_TABLES, logger);

  beforeEach(() => {
    execute.mockReset();
  });

  it('executes the rewritten statement and reports its kind', async () => {
    execute.mockResolvedValue({ columns: ['count'], rows: [{ count: '3' }], rowCount: 1 });

    const result = await gateway.run({ sql: "SELECT COUNT(*) FROM activities WHERE type='Run'", tenantId: 42 });

    expect(execute).toHaveBeenCalledWith({
      sql: "SELECT COUNT(*) FROM activities WHERE tenant_id = ? AND type='Run'",
      params: [42],
      tenantId: 42,
    });
    expect(result).toEqual({ success: true, kind: 'aggregate', columns: ['count'], rows: [{ count: '3' }], rowCount: 1 });
  });

  it('returns a structured failure for rejected SQL without executing', async () => {
    const result = await gateway.run({ sql: 'DROP TABLE activities', tenantId: 42 });

    expect(result).toEqual({
      success: false,
      error: 'Only SELECT statements are allowed, found "DROP"',
      errorType: 'VALIDATION',
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('returns a structured failure for execution timeouts', async () => {
    execute.mockRejectedValue(new TimeoutError('Query exceeded 5000ms', 5000));

    const result = await gateway.run({ sql: 'SELECT * FROM activities', tenantId: 1 });

    expect(result).toEqual({ success: false, error: 'Query exceeded 5000ms', errorType: 'TIMEOUT' });
  });

  it('propagates unexpected errors', async () => {
    execute.mockRejectedValue(new Error('boom'));

    await expect(gateway.run({ sql: 'SELECT * FROM activities', tenantId: 1 })).rejects.toThrow('boom');
  });
});
