import type { Logger } from 'winston';
import type { ActivitySource } from '../../integrations/strava';
import type { SyncStatusStore } from '../../storage/types';
import type { UpsertOutcome } from '../../types';
import type { ActivityReconciler } from './reconciler';

export interface BackfillOptions {
  pageSize: number;
  /** Only activities that started after this instant. */
  after?: Date;
  /** Stop after this many pages even if the provider has more. */
  maxPages?: number;
}

export interface BackfillSummary {
  pages: number;
  created: number;
  updated: number;
  rejected: number;
  /** False when `maxPages` stopped the run before the provider ran out. */
  completed: boolean;
}

/**
 * Imports a tenant's existing activities page by page. Records go through the
 * reconciler, so re-running a backfill only rewrites rows it already created.
 * Progress is kept in the sync status store: a run that fails leaves the
 * tenant started but not completed.
 */
export class BackfillService {
  constructor(
    private source: ActivitySource,
    private reconciler: ActivityReconciler,
    private syncStatus: SyncStatusStore,
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) { }

  async run(tenantId: number, options: BackfillOptions): Promise<BackfillSummary> {
    const log = this.logger.child({ component: 'backfill', tenant_id: tenantId });
    const summary: BackfillSummary = { pages: 0, created: 0, updated: 0, rejected: 0, completed: false };

    await this.syncStatus.start(tenantId, this.now());

    for (let page = 1; ; page++) {
      if (options.maxPages !== undefined && page > options.maxPages) break;

      const records = await this.source.listActivities(tenantId, { page, perPage: options.pageSize, after: options.after });
      if (records.length === 0) {
        summary.completed = true;
        break;
      }
      summary.pages++;

      for (const record of records) {
        const outcome: UpsertOutcome = await this.reconciler.upsert(record, tenantId);
        summary[outcome]++;
      }
      log.info('Backfilled page', { page, count: records.length });

      // A short page is the last one
      if (records.length < options.pageSize) {
        summary.completed = true;
        break;
      }
    }

    await this.syncStatus.finish(tenantId, this.now(), {
      completed: summary.completed,
      activitiesSynced: summary.created + summary.updated,
    });
    log.info('Backfill complete', { ...summary });
    return summary;
  }
}
