export { getSecret, envSecrets } from './manager';
export type { SecretName, SecretsHelper } from './manager';
