import { FrameworkResponse, ValidationError } from '@trailquery/shared';
import { handler, queryHandler } from './index';

describe('query-handler', () => {
  let ctx: any;

  const post = (body: unknown) => handler({ method: 'POST', path: '/query', query: {}, headers: {}, body } as any, {} as any, ctx);

  beforeEach(() => {
    ctx = {
      tenantId: 42,
      logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn() },
      services: { gateway: { run: jest.fn() } },
    };
  });

  it('exports the cloud function', () => {
    expect(typeof queryHandler).toBe('function');
  });

  it('runs the candidate query for the authenticated tenant', async () => {
    const answer = { success: true, kind: 'aggregate', columns: ['count'], rows: [{ count: 3 }], rowCount: 1 };
    ctx.services.gateway.run.mockResolvedValue(answer);

    const result = await post({ sql: 'SELECT COUNT(*) FROM activities', params: [] });

    expect(ctx.services.gateway.run).toHaveBeenCalledWith({ sql: 'SELECT COUNT(*) FROM activities', params: [], tenantId: 42 });
    expect(result).toEqual(answer);
  });

  it('ignores a tenant id in the body', async () => {
    ctx.services.gateway.run.mockResolvedValue({ success: true, kind: 'row', columns: [], rows: [], rowCount: 0 });

    await post({ sql: 'SELECT * FROM activities', tenantId: 7 });

    expect(ctx.services.gateway.run).toHaveBeenCalledWith({ sql: 'SELECT * FROM activities', params: undefined, tenantId: 42 });
  });

  it('returns gateway failures with a matching status', async () => {
    const failure = { success: false, error: 'Only SELECT statements are allowed', errorType: 'VALIDATION' };
    ctx.services.gateway.run.mockResolvedValue(failure);

    const result: any = await post({ sql: 'DROP TABLE activities' });

    expect(result).toBeInstanceOf(FrameworkResponse);
    expect(result.options).toEqual({ status: 400, body: failure });
  });

  it('maps a timeout to 504', async () => {
    ctx.services.gateway.run.mockResolvedValue({ success: false, error: 'canceling statement due to statement timeout', errorType: 'TIMEOUT' });

    const result: any = await post({ sql: 'SELECT * FROM activities' });

    expect(result.options.status).toBe(504);
  });

  it('rejects a body without sql', async () => {
    await expect(post({ query: 'SELECT 1' })).rejects.toBeInstanceOf(ValidationError);
    expect(ctx.services.gateway.run).not.toHaveBeenCalled();
  });
});
