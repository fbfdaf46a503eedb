import { mapStravaActivity, patchFromUpdates, StravaActivitySchema } from './mapping';

describe('mapStravaActivity', () => {
  it('falls back to type when sport_type is absent', () => {
    const record = mapStravaActivity(StravaActivitySchema.parse({ id: 5, type: 'Walk' }));

    expect(record).toEqual({
      id: 5,
      name: null,
      distance: null,
      movingTime: null,
      elapsedTime: null,
      totalElevationGain: null,
      type: 'Walk',
      startDate: null,
    });
  });

  it('rejects payloads without an integer id', () => {
    expect(StravaActivitySchema.safeParse({ id: '5' }).success).toBe(false);
    expect(StravaActivitySchema.safeParse({ id: 5.5 }).success).toBe(false);
  });
});

describe('patchFromUpdates', () => {
  it('maps title to name', () => {
    expect(patchFromUpdates({ title: 'Evening Ride' })).toEqual({ name: 'Evening Ride' });
  });

  it('maps type and prefers sport_type', () => {
    expect(patchFromUpdates({ type: 'Ride' })).toEqual({ type: 'Ride' });
    expect(patchFromUpdates({ type: 'Ride', sport_type: 'GravelRide' })).toEqual({ type: 'GravelRide' });
  });

  it('ignores fields that are not stored', () => {
    expect(patchFromUpdates({ private: 'true' })).toEqual({});
  });

  it('keeps an empty title', () => {
    expect(patchFromUpdates({ title: '' })).toEqual({ name: '' });
  });
});
