import { z } from 'zod';
import {
  AppErrorCode,
  AuthError,
  createCloudFunction,
  FrameworkHandler,
  FrameworkResponse,
  HttpError,
  ServiceTokenStrategy,
  ValidationError,
} from '@trailquery/shared';

const QueryBodySchema = z.object({
  sql: z.string().min(1),
  params: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

const STATUS_BY_ERROR: Record<AppErrorCode, number> = {
  VALIDATION: 400,
  AUTH: 403,
  UPSTREAM: 502,
  TIMEOUT: 504,
  DATABASE: 500,
};

export const handler: FrameworkHandler = async (req, _res, ctx) => {
  if (req.method !== 'POST') {
    throw new HttpError(405, 'Method not allowed');
  }
  if (ctx.tenantId === undefined) {
    throw new AuthError('Caller did not assert a tenant');
  }

  const parsed = QueryBodySchema.safeParse(req.body);
  if (!parsed.success) {
    throw new ValidationError('Expected a JSON body with sql and optional params', { issues: parsed.error.issues });
  }

  const result = await ctx.services.gateway.run({
    sql: parsed.data.sql,
    params: parsed.data.params,
    tenantId: ctx.tenantId,
  });

  if (!result.success) {
    return new FrameworkResponse({ status: STATUS_BY_ERROR[result.errorType], body: result });
  }
  ctx.logger.info('Query answered', { kind: result.kind, rowCount: result.rowCount });
  return result;
};

export const queryHandler = createCloudFunction(handler, {
  auth: {
    strategies: [new ServiceTokenStrategy()],
    requiredScopes: ['query:read'],
  },
});
