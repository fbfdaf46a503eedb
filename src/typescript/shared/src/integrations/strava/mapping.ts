import { z } from 'zod';
import type { ActivityPatch, ActivityRecord } from '../../types';

/** Detailed or summary activity as returned by the provider. */
export const StravaActivitySchema = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  distance: z.number().nullish(),
  moving_time: z.number().int().nullish(),
  elapsed_time: z.number().int().nullish(),
  total_elevation_gain: z.number().nullish(),
  type: z.string().nullish(),
  sport_type: z.string().nullish(),
  start_date: z.string().datetime({ offset: true }).nullish(),
});

export type StravaActivity = z.infer<typeof StravaActivitySchema>;

export function mapStravaActivity(activity: StravaActivity): ActivityRecord {
  return {
    id: activity.id,
    name: activity.name ?? null,
    distance: activity.distance ?? null,
    movingTime: activity.moving_time ?? null,
    elapsedTime: activity.elapsed_time ?? null,
    totalElevationGain: activity.total_elevation_gain ?? null,
    // sport_type is the finer-grained successor of type
    type: activity.sport_type ?? activity.type ?? null,
    startDate: activity.start_date ? new Date(activity.start_date) : null,
  };
}

/**
 * Maps the `updates` of an update event to the columns it changes.
 * Fields the event does not carry are left out, never nulled.
 */
export function patchFromUpdates(updates: Record<string, string>): ActivityPatch {
  const patch: ActivityPatch = {};
  if (Object.hasOwn(updates, 'title')) {
    patch.name = updates.title;
  }
  const type = updates.sport_type ?? updates.type;
  if (type !== undefined) {
    patch.type = type;
  }
  return patch;
}
