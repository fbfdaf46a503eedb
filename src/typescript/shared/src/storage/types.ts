import {
  Activity,
  ActivityPatch,
  PatchOutcome,
  SyncResult,
  SyncStatus,
  TenantCredential,
  TokenRotation,
  UpsertOutcome,
} from '../types';

export interface ActivityStore {
  get(id: number): Promise<Activity | null>;
  /** Creates or replaces the row. Never moves a row to a different tenant. */
  upsert(activity: Activity): Promise<UpsertOutcome>;
  /** Changes only the supplied columns of the tenant's row. */
  patch(id: number, tenantId: number, patch: ActivityPatch): Promise<PatchOutcome>;
  /** Returns false when the tenant had no such row. */
  delete(id: number, tenantId: number): Promise<boolean>;
}

export interface CredentialStore {
  get(tenantId: number): Promise<TenantCredential | null>;
  upsert(credential: TenantCredential): Promise<void>;
  /**
   * Replaces the tokens only if the stored expiry still equals `previousExpiresAt`.
   * Returns false when another writer rotated first.
   */
  rotate(tenantId: number, previousExpiresAt: Date, next: TokenRotation): Promise<boolean>;
  delete(tenantId: number): Promise<boolean>;
}

export interface SyncStatusStore {
  get(tenantId: number): Promise<SyncStatus | null>;
  /** Marks a backfill as running. Clears `completed` until it finishes. */
  start(tenantId: number, at: Date): Promise<void>;
  finish(tenantId: number, at: Date, result: SyncResult): Promise<void>;
}
