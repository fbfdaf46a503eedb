/** Secrets the services read. They are injected as environment variables by the deployment. */
export type SecretName =
  | 'STRAVA_CLIENT_ID'
  | 'STRAVA_CLIENT_SECRET'
  | 'STRAVA_VERIFY_TOKEN'
  | 'OAUTH_STATE_SECRET'
  | 'GATEWAY_SERVICE_TOKEN';

export interface SecretsHelper {
  get(name: SecretName): string;
}

/**
 * Reads a secret from the given environment.
 * @param secretName The name of the environment variable containing the secret.
 * @throws Error if the secret is not set.
 */
export function getSecret(env: NodeJS.ProcessEnv, secretName: SecretName): string {
  const value = env[secretName];

  if (!value) {
    throw new Error(`Secret ${secretName} not found in environment variables`);
  }

  return value;
}

/**
 * Secrets helper over a snapshot of the environment taken at startup.
 * A missing secret only fails the handler that asks for it.
 */
export function envSecrets(env: NodeJS.ProcessEnv): SecretsHelper {
  const snapshot = { ...env };
  return {
    get: (name) => getSecret(snapshot, name),
  };
}
