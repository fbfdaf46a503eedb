import { Pool } from 'pg';
import { PostgresActivityStore } from './activity-store';

describe('PostgresActivityStore', () => {
  const query = jest.fn();
  const store = new PostgresActivityStore({ query } as unknown as Pool);

  const activity = {
    id: 555,
    tenantId: 42,
    name: 'Morning Run',
    distance: 5000,
    movingTime: 1500,
    elapsedTime: 1600,
    totalElevationGain: 12.5,
    type: 'Run',
    startDate: new Date('2024-03-01T07:00:00Z'),
  };

  beforeEach(() => {
    query.mockReset();
  });

  describe('upsert', () => {
    it('reports a fresh insert as created', async () => {
      query.mockResolvedValue({ rows: [{ inserted: true }], rowCount: 1 });

      expect(await store.upsert(activity)).toBe('created');
      expect(query.mock.calls[0][1]).toEqual([
        555, 42, 'Morning Run', 5000, 1500, 1600, 12.5, 'Run', new Date('2024-03-01T07:00:00Z'),
      ]);
      expect(query.mock.calls[0][0]).toContain('WHERE activities.tenant_id = EXCLUDED.tenant_id');
    });

    it('reports an overwrite of the same tenant row as updated', async () => {
      query.mockResolvedValue({ rows: [{ inserted: false }], rowCount: 1 });

      expect(await store.upsert(activity)).toBe('updated');
    });

    it('reports a conflicting tenant as rejected', async () => {
      query.mockResolvedValue({ rows: [], rowCount: 0 });

      expect(await store.upsert(activity)).toBe('rejected');
    });
  });

  describe('patch', () => {
    it('updates only the supplied columns', async () => {
      query.mockResolvedValue({ rows: [], rowCount: 1 });

      expect(await store.patch(555, 42, { name: 'Renamed' })).toBe('applied');
      expect(query).toHaveBeenCalledWith(
        'UPDATE activities SET name = $3, updated_at = now() WHERE id = $1 AND tenant_id = $2',
        [555, 42, 'Renamed']
      );
    });

    it('numbers parameters for several columns', async () => {
      query.mockResolvedValue({ rows: [], rowCount: 1 });

      await store.patch(555, 42, { name: 'Renamed', type: 'Walk' });

      expect(query).toHaveBeenCalledWith(
        'UPDATE activities SET name = $3, type = $4, updated_at = now() WHERE id = $1 AND tenant_id = $2',
        [555, 42, 'Renamed', 'Walk']
      );
    });

    it('reports a missing row', async () => {
      query.mockResolvedValue({ rows: [], rowCount: 0 });

      expect(await store.patch(555, 42, { type: 'Walk' })).toBe('missing');
    });

    it('does not touch the database for an empty patch', async () => {
      expect(await store.patch(555, 42, {})).toBe('noop');
      expect(query).not.toHaveBeenCalled();
    });
  });

  it('deletes by id and tenant', async () => {
    query.mockResolvedValue({ rows: [], rowCount: 0 });

    expect(await store.delete(555, 42)).toBe(false);
    expect(query).toHaveBeenCalledWith('DELETE FROM activities WHERE id = $1 AND tenant_id = $2', [555, 42]);
  });

  it('maps BIGINT strings back to numbers', async () => {
    query.mockResolvedValue({
      rows: [{
        id: '555', tenant_id: '42', name: 'Morning Run', distance: 5000, moving_time: 1500, elapsed_time: 1600,
        total_elevation_gain: 12.5, type: 'Run', start_date: new Date('2024-03-01T07:00:00Z'),
      }],
    });

    expect(await store.get(555)).toEqual(activity);
  });
});
