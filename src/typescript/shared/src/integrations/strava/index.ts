export * from './client';
export * from './mapping';
export * from './subscriptions';
export type { paths as StravaPaths } from './api';
