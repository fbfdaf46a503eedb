import type { Request } from '@google-cloud/functions-framework';
import type { Logger } from 'winston';
import type { SecretsHelper } from '../infrastructure/secrets';

export interface AuthResult {
  /** Who made the call, for logs. */
  principal: string;
  /** Tenant the caller acts for, when the credential asserts one. */
  tenantId?: number;
  scopes: string[];
}

/** What a strategy may use while authenticating; the full context does not exist yet. */
export interface AuthContext {
  secrets: SecretsHelper;
  logger: Logger;
}

export interface AuthStrategy {
  name: string;
  /** Returns null when the request does not carry this kind of credential. */
  authenticate(req: Request, ctx: AuthContext): Promise<AuthResult | null>;
}
