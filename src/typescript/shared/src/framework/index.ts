import type { Request, Response } from '@google-cloud/functions-framework';
import type { Logger } from 'winston';
import type { AppConfig } from '../config';
import { errorMessage, isAppError } from '../errors';
import { captureException, flushSentry } from '../infrastructure/sentry';
import type { SecretsHelper } from '../infrastructure/secrets';
import { AuthStrategy } from './auth';
import { HttpError } from './errors';
import { FrameworkResponse } from './response';
import { getDefaultRuntime, Runtime, Services, Stores } from './runtime';

export * from './auth';
export * from './auth-strategies';
export * from './response';
export * from './runtime';

export interface FrameworkContext {
  config: AppConfig;
  stores: Stores;
  services: Services;
  secrets: SecretsHelper;
  logger: Logger;
  executionId: string;
  /** Set when an auth strategy asserted the caller's tenant. */
  tenantId?: number;
  authScopes: string[];
}

export type FrameworkHandler = (req: Request, res: Response, ctx: FrameworkContext) => Promise<unknown>;

export interface CloudFunctionOptions {
  auth?: {
    strategies: AuthStrategy[]; // Only accept strategy instances
    requiredScopes?: string[];
  };
  /**
   * Set to true for public endpoints that don't require authentication.
   * If false/undefined and no auth.strategies, createCloudFunction throws.
   */
  allowUnauthenticated?: boolean;
  /** Defaults to the runtime configured from the process environment. */
  runtime?: () => Runtime;
}

const SENTRY_FLUSH_TIMEOUT_MS = 2000;

function statusOf(err: unknown): number {
  if (isAppError(err) || err instanceof HttpError) return err.statusCode;
  return 500;
}

function errorBody(err: unknown, status: number): Record<string, unknown> {
  if (isAppError(err)) return { error: err.message, errorType: err.code };
  if (err instanceof HttpError && status < 500) return { error: err.message };
  return { error: 'Internal Server Error' };
}

function sendResult(res: Response, result: unknown): void {
  if (result instanceof FrameworkResponse) {
    const { status, body, headers } = result.options;
    res.status(status ?? 200);
    for (const [name, value] of Object.entries(headers ?? {})) {
      res.set(name, value);
    }
    if (body === undefined) {
      res.end();
    } else if (typeof body === 'string') {
      res.send(body);
    } else {
      res.json(body);
    }
    return;
  }
  if (result === undefined) {
    res.status(204).end();
    return;
  }
  res.status(200).json(result);
}

/**
 * Wraps a handler as an HTTP Cloud Function: authenticates the request, builds
 * the per-request context, serialises the result and maps thrown errors to
 * status codes. Server-side failures are reported to Sentry before responding.
 */
export const createCloudFunction = (handler: FrameworkHandler, options?: CloudFunctionOptions) => {
  // SECURITY: Require auth by default - handlers must explicitly opt out
  const hasAuth = options?.auth?.strategies && options.auth.strategies.length > 0;
  const isPublic = options?.allowUnauthenticated === true;

  if (!hasAuth && !isPublic) {
    throw new Error(
      'Security: Auth required. Add auth.strategies or set allowUnauthenticated: true'
    );
  }
  const resolveRuntime = options?.runtime ?? getDefaultRuntime;

  return async (req: Request, res: Response): Promise<void> => {
    const runtime = resolveRuntime();
    const { config } = runtime;
    const executionId = `${config.serviceName}-${Date.now()}`;

    const preambleLogger = runtime.logger.child({ executionId, component: 'framework' });
    preambleLogger.debug('Incoming Request', { method: req.method, path: req.path, query: req.query });

    let tenantId: number | undefined;
    let authScopes: string[] = [];

    try {
      // --- AUTHENTICATION ---
      if (options?.auth?.strategies && options.auth.strategies.length > 0) {
        let authenticated = false;

        for (const strategy of options.auth.strategies) {
          try {
            const authResult = await strategy.authenticate(req, { secrets: config.secrets, logger: preambleLogger });
            if (authResult) {
              tenantId = authResult.tenantId;
              authScopes = authResult.scopes;
              authenticated = true;
              preambleLogger.info(`Authenticated via ${strategy.name}`, {
                principal: authResult.principal,
                tenant_id: tenantId,
                scopes: authScopes,
              });
              break;
            }
          } catch (e) {
            preambleLogger.warn(`Auth strategy ${strategy.name} failed`, { error: e });
          }
        }

        if (!authenticated) {
          preambleLogger.warn('Request failed authentication filters');
          res.status(401).send('Unauthorized');
          return;
        }

        if (options.auth.requiredScopes) {
          const hasScopes = options.auth.requiredScopes.every(scope => authScopes.includes(scope));
          if (!hasScopes) {
            preambleLogger.warn('Caller missing required scopes', { scopes: authScopes });
            res.status(403).send('Forbidden: Insufficient Scopes');
            return;
          }
        }
      }
      // --- END AUTH ---

      const ctx: FrameworkContext = {
        config,
        stores: runtime.stores,
        services: runtime.services,
        secrets: config.secrets,
        logger: runtime.logger.child({
          executionId,
          ...(tenantId !== undefined && { tenant_id: tenantId }),
          component: 'context',
        }),
        executionId,
        tenantId,
        authScopes,
      };

      res.set('x-execution-id', executionId);
      const result = await handler(req, res, ctx);
      if (!res.headersSent) {
        sendResult(res, result);
      }

      preambleLogger.info('Function completed successfully', { status: res.statusCode });
    } catch (err: unknown) {
      const status = statusOf(err);

      if (status >= 500) {
        preambleLogger.error('Function failed', { error: err, status });

        if (runtime.sentryEnabled) {
          captureException(err instanceof Error ? err : new Error(errorMessage(err)), {
            service: config.serviceName,
            execution_id: executionId,
            tenant_id: tenantId,
          }, preambleLogger);
          // Wait for Sentry to send the event before the instance is frozen
          await flushSentry(SENTRY_FLUSH_TIMEOUT_MS, preambleLogger);
        }
      } else {
        preambleLogger.warn('Request rejected', { status, error: errorMessage(err) });
      }

      if (!res.headersSent) {
        res.set('x-execution-id', executionId);
        res.status(status).json(errorBody(err, status));
      }
    }
  };
};
