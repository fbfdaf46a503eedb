export { createPool } from './pool';
export { PostgresActivityStore } from './activity-store';
export { PostgresCredentialStore } from './credential-store';
export { PostgresSyncStatusStore } from './sync-status-store';
export { applySchema, GATEWAY_READABLE_TABLES, SCHEMA_PATH } from './migrate';
export type { ApplySchemaOptions } from './migrate';
