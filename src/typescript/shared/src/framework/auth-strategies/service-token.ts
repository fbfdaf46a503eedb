import type { Request } from '@google-cloud/functions-framework';
import * as crypto from 'crypto';
import { AuthContext, AuthResult, AuthStrategy } from '../auth';

const TENANT_HEADER = 'x-tenant-id';

/**
 * ServiceTokenStrategy authenticates internal callers that share the gateway
 * service token. The caller asserts the tenant in the `x-tenant-id` header.
 */
export class ServiceTokenStrategy implements AuthStrategy {
  name = 'service_token';

  async authenticate(req: Request, ctx: AuthContext): Promise<AuthResult | null> {
    const authHeader = req.headers['authorization'];
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return null; // Not this strategy or missing
    }

    const presented = Buffer.from(authHeader.slice('Bearer '.length));
    const expected = Buffer.from(ctx.secrets.get('GATEWAY_SERVICE_TOKEN'));
    if (presented.length !== expected.length || !crypto.timingSafeEqual(presented, expected)) {
      ctx.logger.warn('Auth failed: service token mismatch');
      return null;
    }

    const tenantHeader = req.headers[TENANT_HEADER];
    const tenantId = typeof tenantHeader === 'string' && /^[1-9][0-9]*$/.test(tenantHeader)
      ? Number(tenantHeader)
      : undefined;
    if (tenantId === undefined || !Number.isSafeInteger(tenantId)) {
      ctx.logger.warn(`Auth failed: missing or invalid ${TENANT_HEADER} header`);
      return null;
    }

    return { principal: 'service', tenantId, scopes: ['query:read'] };
  }
}
