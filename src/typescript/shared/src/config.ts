import { z } from 'zod';
import { envSecrets, SecretsHelper } from './infrastructure/secrets';
import type { TenantTables } from './sql/rewriter';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface DatabaseConfig {
  /** Owner connection used by the migration and the ingestion stores. */
  url: string;
  /**
   * Connection the query gateway uses. Its role must not own `activities`, so
   * the row-level security policy applies to every gateway query.
   */
  gatewayUrl: string;
  poolMax: number;
  /** Server-side `statement_timeout` applied to every gateway query. */
  statementTimeoutMs: number;
  /** Client-side deadline on a single query round trip. */
  queryTimeoutMs: number;
}

export interface StravaConfig {
  apiBaseUrl: string;
  tokenUrl: string;
  authorizeUrl: string;
  scope: string;
  /** Webhook events for any other subscription are refused when set. */
  subscriptionId?: number;
  requestTimeoutMs: number;
  /** Tokens expiring within this many seconds are refreshed ahead of time. */
  refreshWindowSeconds: number;
}

export interface OAuthConfig {
  /** Callback URL registered with the provider. */
  redirectUri?: string;
  successRedirectUrl: string;
  failureRedirectUrl: string;
  stateTtlMs: number;
}

export interface IngestionConfig {
  /** Fetch and create the record when an update arrives for an unknown id. */
  fetchOnPatchMiss: boolean;
  backfillPageSize: number;
}

export interface SentrySettings {
  dsn?: string;
  tracesSampleRate: number;
}

export interface AppConfig {
  serviceName: string;
  environment: string;
  release: string;
  logLevel: LogLevel;
  database: DatabaseConfig;
  strava: StravaConfig;
  oauth: OAuthConfig;
  ingestion: IngestionConfig;
  gateway: { tables: TenantTables };
  sentry: SentrySettings;
  secrets: SecretsHelper;
}

const positiveInt = z.coerce.number().int().positive();
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));
const flag = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const tenantTables = z
  .string()
  .regex(/^\s*[a-z_][a-z0-9_]*:[a-z_][a-z0-9_]*\s*(,\s*[a-z_][a-z0-9_]*:[a-z_][a-z0-9_]*\s*)*$/, {
    message: 'expected table:column pairs separated by commas',
  })
  .transform((value) =>
    Object.fromEntries(
      value.split(',').map((pair): [string, string] => {
        const [table, column] = pair.trim().split(':');
        return [table, column];
      })
    )
  );

const EnvSchema = z.object({
  K_SERVICE: z.string().default('trailquery'),
  APP_ENV: z.string().default('development'),
  SENTRY_RELEASE: optionalString,
  K_REVISION: optionalString,
  LOG_LEVEL: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),

  DATABASE_URL: z.string().min(1),
  GATEWAY_DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: positiveInt.default(5),
  QUERY_STATEMENT_TIMEOUT_MS: positiveInt.default(5000),
  QUERY_CLIENT_TIMEOUT_MS: positiveInt.default(10000),

  STRAVA_API_BASE_URL: z.string().url().default('https://www.strava.com/api/v3'),
  STRAVA_TOKEN_URL: z.string().url().default('https://www.strava.com/oauth/token'),
  STRAVA_AUTHORIZE_URL: z.string().url().default('https://www.strava.com/oauth/authorize'),
  STRAVA_OAUTH_SCOPE: z.string().default('read,activity:read_all'),
  STRAVA_SUBSCRIPTION_ID: optionalString.pipe(z.coerce.number().int().positive().optional()),
  STRAVA_REQUEST_TIMEOUT_MS: positiveInt.default(10000),
  TOKEN_REFRESH_WINDOW_SECONDS: z.coerce.number().int().min(0).default(60),

  OAUTH_REDIRECT_URI: optionalString.pipe(z.string().url().optional()),
  OAUTH_SUCCESS_REDIRECT_URL: z.string().default('/connected'),
  OAUTH_FAILURE_REDIRECT_URL: z.string().default('/connect-failed'),
  OAUTH_STATE_TTL_MS: positiveInt.default(10 * 60 * 1000),

  INGEST_FETCH_ON_PATCH_MISS: flag.default('true'),
  BACKFILL_PAGE_SIZE: z.coerce.number().int().min(1).max(200).default(30),

  TENANT_TABLES: tenantTables.default('activities:tenant_id'),

  SENTRY_DSN: optionalString,
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
}).superRefine((env, ctx) => {
  const gatewayRole = databaseRole(env.GATEWAY_DATABASE_URL);
  if (!gatewayRole) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GATEWAY_DATABASE_URL'], message: 'must name a database role' });
  } else if (gatewayRole === databaseRole(env.DATABASE_URL)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['GATEWAY_DATABASE_URL'],
      message: 'must use a different role than DATABASE_URL',
    });
  }
});

/** The role a connection URL logs in as, or undefined when it names none. */
export function databaseRole(url: string): string | undefined {
  try {
    const role = decodeURIComponent(new URL(url).username);
    return role || undefined;
  } catch {
    return undefined;
  }
}

/**
 * Validates the process environment into the configuration every component
 * receives. Call once at cold start; nothing else reads the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return Object.freeze({
    serviceName: e.K_SERVICE,
    environment: e.APP_ENV,
    release: e.SENTRY_RELEASE ?? e.K_REVISION ?? 'unknown',
    logLevel: e.LOG_LEVEL,
    database: {
      url: e.DATABASE_URL,
      gatewayUrl: e.GATEWAY_DATABASE_URL,
      poolMax: e.DATABASE_POOL_MAX,
      statementTimeoutMs: e.QUERY_STATEMENT_TIMEOUT_MS,
      queryTimeoutMs: e.QUERY_CLIENT_TIMEOUT_MS,
    },
    strava: {
      apiBaseUrl: e.STRAVA_API_BASE_URL.replace(/\/+$/, ''),
      tokenUrl: e.STRAVA_TOKEN_URL,
      authorizeUrl: e.STRAVA_AUTHORIZE_URL,
      scope: e.STRAVA_OAUTH_SCOPE,
      subscriptionId: e.STRAVA_SUBSCRIPTION_ID,
      requestTimeoutMs: e.STRAVA_REQUEST_TIMEOUT_MS,
      refreshWindowSeconds: e.TOKEN_REFRESH_WINDOW_SECONDS,
    },
    oauth: {
      redirectUri: e.OAUTH_REDIRECT_URI,
      successRedirectUrl: e.OAUTH_SUCCESS_REDIRECT_URL,
      failureRedirectUrl: e.OAUTH_FAILURE_REDIRECT_URL,
      stateTtlMs: e.OAUTH_STATE_TTL_MS,
    },
    ingestion: {
      fetchOnPatchMiss: e.INGEST_FETCH_ON_PATCH_MISS,
      backfillPageSize: e.BACKFILL_PAGE_SIZE,
    },
    gateway: { tables: e.TENANT_TABLES },
    sentry: {
      dsn: e.SENTRY_DSN,
      tracesSampleRate: e.SENTRY_TRACES_SAMPLE_RATE,
    },
    secrets: envSecrets(env),
  });
}
