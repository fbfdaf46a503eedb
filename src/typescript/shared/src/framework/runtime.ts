import type { Pool } from 'pg';
import type { Logger } from 'winston';
import { AppConfig, loadConfig } from '../config';
import { ActivityReconciler } from '../domain/services';
import { ActivitySource, StravaActivitySource } from '../integrations/strava';
import { createLogger } from '../infrastructure/logging';
import { OAuthTokenClient, StravaOAuthClient, TokenLifecycleManager } from '../infrastructure/oauth';
import { initSentry } from '../infrastructure/sentry';
import { QueryExecutor, QueryGateway } from '../sql';
import {
  ActivityStore,
  CredentialStore,
  PostgresActivityStore,
  PostgresCredentialStore,
  PostgresSyncStatusStore,
  SyncStatusStore,
  createPool,
} from '../storage';

export interface Stores {
  activities: ActivityStore;
  credentials: CredentialStore;
  syncStatus: SyncStatusStore;
}

export interface Services {
  tokens: TokenLifecycleManager;
  oauth: OAuthTokenClient;
  activitySource: ActivitySource;
  reconciler: ActivityReconciler;
  gateway: QueryGateway;
}

/** Process-wide dependencies, built once per instance and shared by every request. */
export interface Runtime {
  config: AppConfig;
  logger: Logger;
  /** Owner connections for migrations and the ingestion stores. */
  pool: Pool;
  /** Connections as the gateway role, for candidate queries only. */
  gatewayPool: Pool;
  stores: Stores;
  services: Services;
  /** Whether failures are reported to Sentry. */
  sentryEnabled: boolean;
  close(): Promise<void>;
}

export function createRuntime(config: AppConfig, logger: Logger = createLogger({
  serviceName: config.serviceName,
  level: config.logLevel,
})): Runtime {
  const sentryEnabled = initSentry({
    dsn: config.sentry.dsn,
    environment: config.environment,
    release: config.release,
    serverName: config.serviceName,
    tracesSampleRate: config.sentry.tracesSampleRate,
  }, logger);

  const pool: Pool = createPool(config.database, logger);
  const gatewayPool: Pool = createPool(config.database, logger, config.database.gatewayUrl);
  const stores: Stores = {
    activities: new PostgresActivityStore(pool),
    credentials: new PostgresCredentialStore(pool),
    syncStatus: new PostgresSyncStatusStore(pool),
  };

  const oauth = new StravaOAuthClient(config.strava, config.secrets, logger);
  const tokens = new TokenLifecycleManager(stores.credentials, oauth, logger, {
    refreshWindowSeconds: config.strava.refreshWindowSeconds,
  });
  const executor = new QueryExecutor(gatewayPool, { statementTimeoutMs: config.database.statementTimeoutMs }, logger);

  return {
    config,
    logger,
    pool,
    gatewayPool,
    stores,
    services: {
      tokens,
      oauth,
      activitySource: new StravaActivitySource(config.strava, tokens, logger),
      reconciler: new ActivityReconciler(stores.activities, logger),
      gateway: new QueryGateway(executor, config.gateway.tables, logger),
    },
    sentryEnabled,
    close: async () => {
      await Promise.all([pool.end(), gatewayPool.end()]);
    },
  };
}

let defaultRuntime: Runtime | undefined;

/** Runtime configured from the process environment on first use. */
export function getDefaultRuntime(): Runtime {
  if (!defaultRuntime) {
    defaultRuntime = createRuntime(loadConfig(process.env));
  }
  return defaultRuntime;
}
