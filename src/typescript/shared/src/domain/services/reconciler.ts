import type { Logger } from 'winston';
import type { ActivityStore } from '../../storage/types';
import type { ActivityPatch, ActivityRecord, PatchOutcome, UpsertOutcome } from '../../types';

/**
 * Applies create, update and delete notifications to the activity table.
 *
 * Every method is idempotent by activity id and issues a single statement, so
 * redelivered or reordered events converge on the same row.
 */
export class ActivityReconciler {
  constructor(private activities: ActivityStore, private logger: Logger) { }

  /** Stamps the tenant asserted by the event and writes the whole record. */
  async upsert(record: ActivityRecord, tenantId: number): Promise<UpsertOutcome> {
    const outcome = await this.activities.upsert({ ...record, tenantId });
    if (outcome === 'rejected') {
      this.logger.warn('Refused to move activity to another tenant', {
        component: 'reconciler',
        activity_id: record.id,
        tenant_id: tenantId,
      });
    } else {
      this.logger.debug(`Activity ${outcome}`, { component: 'reconciler', activity_id: record.id, tenant_id: tenantId });
    }
    return outcome;
  }

  /** Changes only the fields present in the patch; a missing row is left missing. */
  async patch(id: number, tenantId: number, patch: ActivityPatch): Promise<PatchOutcome> {
    const outcome = await this.activities.patch(id, tenantId, patch);
    this.logger.debug(`Activity patch ${outcome}`, {
      component: 'reconciler',
      activity_id: id,
      tenant_id: tenantId,
      fields: Object.keys(patch),
    });
    return outcome;
  }

  /** Deleting a row that is already gone is not an error. */
  async delete(id: number, tenantId: number): Promise<boolean> {
    const deleted = await this.activities.delete(id, tenantId);
    if (!deleted) {
      this.logger.info('Activity already absent', { component: 'reconciler', activity_id: id, tenant_id: tenantId });
    }
    return deleted;
  }
}
