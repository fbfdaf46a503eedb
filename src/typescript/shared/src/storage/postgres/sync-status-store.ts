import { Pool } from 'pg';
import { withDatabaseErrors } from './errors';
import { SyncResult, SyncStatus } from '../../types';
import { SyncStatusStore } from '../types';

interface SyncStatusRow {
  tenant_id: string;
  sync_started: Date | null;
  sync_completed: boolean;
  last_sync_date: Date | null;
  activities_synced: number;
}

export class PostgresSyncStatusStore implements SyncStatusStore {
  constructor(private pool: Pool) { }

  async get(tenantId: number): Promise<SyncStatus | null> {
    const result = await withDatabaseErrors(() => this.pool.query<SyncStatusRow>(
      `SELECT tenant_id, sync_started, sync_completed, last_sync_date, activities_synced
         FROM sync_status WHERE tenant_id = $1`,
      [tenantId]
    ));
    if (result.rows.length === 0) return null;

    const row = result.rows[0];
    return {
      tenantId: Number(row.tenant_id),
      startedAt: row.sync_started,
      completed: row.sync_completed,
      lastSyncAt: row.last_sync_date,
      activitiesSynced: row.activities_synced,
    };
  }

  async start(tenantId: number, at: Date): Promise<void> {
    await withDatabaseErrors(() => this.pool.query(
      `INSERT INTO sync_status (tenant_id, sync_started, sync_completed)
       VALUES ($1, $2, false)
       ON CONFLICT (tenant_id) DO UPDATE SET
         sync_started = EXCLUDED.sync_started,
         sync_completed = false,
         updated_at = now()`,
      [tenantId, at]
    ));
  }

  async finish(tenantId: number, at: Date, result: SyncResult): Promise<void> {
    await withDatabaseErrors(() => this.pool.query(
      `INSERT INTO sync_status (tenant_id, sync_completed, last_sync_date, activities_synced)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (tenant_id) DO UPDATE SET
         sync_completed = EXCLUDED.sync_completed,
         last_sync_date = EXCLUDED.last_sync_date,
         activities_synced = EXCLUDED.activities_synced,
         updated_at = now()`,
      [tenantId, result.completed, at, result.activitiesSynced]
    ));
  }
}
