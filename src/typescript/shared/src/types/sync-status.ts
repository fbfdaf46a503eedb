/** Progress of a tenant's historical import. */
export interface SyncStatus {
  tenantId: number;
  startedAt: Date | null;
  /** True once a backfill has read the provider's history to the end. */
  completed: boolean;
  lastSyncAt: Date | null;
  /** Records created or updated by the most recent backfill. */
  activitiesSynced: number;
}

export interface SyncResult {
  completed: boolean;
  activitiesSynced: number;
}
