/** One activity row. Identifiers come from the provider and are unique across tenants. */
export interface Activity {
  id: number;
  tenantId: number;
  name: string | null;
  /** Meters. */
  distance: number | null;
  /** Seconds. */
  movingTime: number | null;
  /** Seconds. */
  elapsedTime: number | null;
  /** Meters. */
  totalElevationGain: number | null;
  type: string | null;
  startDate: Date | null;
}

/** Activity as fetched from the provider, before the owner asserted by the event is stamped on it. */
export type ActivityRecord = Omit<Activity, 'tenantId'>;

/** Columns an update event may change. */
export type ActivityPatch = Partial<Pick<Activity, 'name' | 'type'>>;

export type UpsertOutcome = 'created' | 'updated' | 'rejected';
export type PatchOutcome = 'applied' | 'missing' | 'noop';
