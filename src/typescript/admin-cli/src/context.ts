import {
  createLogger,
  createRuntime,
  loadConfig,
  Runtime,
  StravaSubscriptions,
} from '@trailquery/shared';

/** What the commands need; built lazily so `--help` works without configuration. */
export interface CliContext {
  runtime(): Runtime;
  subscriptions(): StravaSubscriptions;
  close(): Promise<void>;
}

export function createCliContext(env: NodeJS.ProcessEnv): CliContext {
  let runtime: Runtime | undefined;

  const getRuntime = (): Runtime => {
    if (!runtime) {
      const config = loadConfig(env);
      runtime = createRuntime(config, createLogger({ serviceName: 'admin-cli', level: 'warn' }));
    }
    return runtime;
  };

  return {
    runtime: getRuntime,
    subscriptions: () => {
      const { config } = getRuntime();
      return new StravaSubscriptions(config.strava, {
        clientId: config.secrets.get('STRAVA_CLIENT_ID'),
        clientSecret: config.secrets.get('STRAVA_CLIENT_SECRET'),
      });
    },
    close: async () => {
      if (runtime) await runtime.close();
    },
  };
}
