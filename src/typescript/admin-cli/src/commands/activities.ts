import { Command } from 'commander';
import { BackfillService } from '@trailquery/shared';
import { CliContext } from '../context';
import { parseTenantId } from './arguments';

export function addActivitiesCommands(program: Command, cli: CliContext) {
  program.command('activities:backfill <tenantId>')
    .description('Import a tenant\'s existing activities from the provider')
    .option('--after <date>', 'Only activities that started after this ISO date')
    .option('--max-pages <n>', 'Stop after this many pages')
    .action(async (tenantIdArg: string, options: { after?: string; maxPages?: string }) => {
      try {
        const tenantId = parseTenantId(tenantIdArg);
        const after = options.after ? new Date(options.after) : undefined;
        if (after && Number.isNaN(after.getTime())) {
          throw new Error(`Invalid --after date: ${options.after}`);
        }
        const maxPages = options.maxPages ? Number(options.maxPages) : undefined;
        if (maxPages !== undefined && (!Number.isSafeInteger(maxPages) || maxPages <= 0)) {
          throw new Error(`Invalid --max-pages: ${options.maxPages}`);
        }

        const { config, logger, services, stores } = cli.runtime();
        const backfill = new BackfillService(services.activitySource, services.reconciler, stores.syncStatus, logger);
        console.log(`Backfilling activities for tenant ${tenantId}...`);
        const summary = await backfill.run(tenantId, {
          pageSize: config.ingestion.backfillPageSize,
          after,
          maxPages,
        });

        console.log(`✅ ${summary.pages} page(s): ${summary.created} created, ${summary.updated} updated, ${summary.rejected} rejected`);
        if (!summary.completed) {
          console.log('⚠️  Stopped at --max-pages; the tenant\'s history is not fully imported');
        }
      } catch (error) {
        console.error('Backfill failed:', error);
        process.exitCode = 1;
      }
    });

  program.command('activities:status <tenantId>')
    .description('Show whether a tenant\'s history has been imported')
    .action(async (tenantIdArg: string) => {
      try {
        const tenantId = parseTenantId(tenantIdArg);
        const status = await cli.runtime().stores.syncStatus.get(tenantId);
        if (!status) {
          console.log(`Tenant ${tenantId} has never been backfilled`);
          return;
        }

        console.log(`Sync status for tenant ${tenantId}:`);
        console.log(`   Started:   ${status.startedAt?.toISOString() ?? '-'}`);
        console.log(`   Completed: ${status.completed ? 'yes' : 'no'}`);
        console.log(`   Last sync: ${status.lastSyncAt?.toISOString() ?? '-'}`);
        console.log(`   Activities synced: ${status.activitiesSynced}`);
      } catch (error) {
        console.error('Failed to read sync status:', error);
        process.exitCode = 1;
      }
    });
}
