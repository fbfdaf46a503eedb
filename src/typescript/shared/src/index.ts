export * from './config';
export * from './errors';
export * from './types';
export * from './sql';
export * from './storage';
export * from './infrastructure/http';
export * from './infrastructure/logging';
export * from './infrastructure/oauth';
export * from './infrastructure/secrets';
export * from './infrastructure/sentry';
export * from './integrations';
export * from './domain/services';
export * from './framework';
export * from './routing';
