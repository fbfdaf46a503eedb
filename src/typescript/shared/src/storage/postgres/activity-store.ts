import { Pool } from 'pg';
import { withDatabaseErrors } from './errors';
import { Activity, ActivityPatch, PatchOutcome, UpsertOutcome } from '../../types';
import { ActivityStore } from '../types';

interface ActivityRow {
  id: string;
  tenant_id: string;
  name: string | null;
  distance: number | null;
  moving_time: number | null;
  elapsed_time: number | null;
  total_elevation_gain: number | null;
  type: string | null;
  start_date: Date | null;
}

const PATCH_COLUMNS: ReadonlyArray<[keyof ActivityPatch, string]> = [
  ['name', 'name'],
  ['type', 'type'],
];

/**
 * PostgresActivityStore keeps one row per provider activity id.
 * Every write is a single statement keyed by id.
 */
export class PostgresActivityStore implements ActivityStore {
  constructor(private pool: Pool) { }

  async get(id: number): Promise<Activity | null> {
    const result = await withDatabaseErrors(() => this.pool.query<ActivityRow>(
      `SELECT id, tenant_id, name, distance, moving_time, elapsed_time, total_elevation_gain, type, start_date
         FROM activities WHERE id = $1`,
      [id]
    ));
    return result.rows.length > 0 ? fromRow(result.rows[0]) : null;
  }

  /**
   * Insert or overwrite the activity. The conflict branch only fires when the
   * existing row belongs to the same tenant; otherwise nothing is returned.
   */
  async upsert(activity: Activity): Promise<UpsertOutcome> {
    const result = await withDatabaseErrors(() => this.pool.query<{ inserted: boolean }>(
      `INSERT INTO activities
         (id, tenant_id, name, distance, moving_time, elapsed_time, total_elevation_gain, type, start_date)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (id) DO UPDATE SET
         name = EXCLUDED.name,
         distance = EXCLUDED.distance,
         moving_time = EXCLUDED.moving_time,
         elapsed_time = EXCLUDED.elapsed_time,
         total_elevation_gain = EXCLUDED.total_elevation_gain,
         type = EXCLUDED.type,
         start_date = EXCLUDED.start_date,
         updated_at = now()
       WHERE activities.tenant_id = EXCLUDED.tenant_id
       RETURNING (xmax = 0) AS inserted`,
      [
        activity.id,
        activity.tenantId,
        activity.name,
        activity.distance,
        activity.movingTime,
        activity.elapsedTime,
        activity.totalElevationGain,
        activity.type,
        activity.startDate,
      ]
    ));
    if (result.rows.length === 0) return 'rejected';
    return result.rows[0].inserted ? 'created' : 'updated';
  }

  async patch(id: number, tenantId: number, patch: ActivityPatch): Promise<PatchOutcome> {
    const present = PATCH_COLUMNS.filter(([key]) => patch[key] !== undefined);
    if (present.length === 0) return 'noop';

    const assignments = present.map(([, column], index) => `${column} = $${index + 3}`);
    const result = await withDatabaseErrors(() => this.pool.query(
      `UPDATE activities SET ${assignments.join(', ')}, updated_at = now() WHERE id = $1 AND tenant_id = $2`,
      [id, tenantId, ...present.map(([key]) => patch[key])]
    ));
    return result.rowCount ? 'applied' : 'missing';
  }

  async delete(id: number, tenantId: number): Promise<boolean> {
    const result = await withDatabaseErrors(() => this.pool.query('DELETE FROM activities WHERE id = $1 AND tenant_id = $2', [id, tenantId]));
    return Boolean(result.rowCount);
  }
}

function fromRow(row: ActivityRow): Activity {
  return {
    id: Number(row.id),
    tenantId: Number(row.tenant_id),
    name: row.name,
    distance: row.distance,
    movingTime: row.moving_time,
    elapsedTime: row.elapsed_time,
    totalElevationGain: row.total_elevation_gain,
    type: row.type,
    startDate: row.start_date,
  };
}
